import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import type { Registry } from "@/registry/registry"
import type { RepoEntry } from "@/registry/types"

export async function renameCommand(
	registry: Registry,
	oldName: string,
	newName: string,
): Promise<void> {
	printOutcome(await renameRepo(registry, oldName, newName))
}

export async function renameRepo(
	registry: Registry,
	oldName: string,
	newName: string,
): Promise<CommandResult<RepoEntry>> {
	const result = await registry.rename(oldName, newName)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	consola.success(`Renamed ${oldName} to ${result.value.name}.`)
	return CommandResult.completed(result.value)
}
