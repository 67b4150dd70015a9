import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import type { Registry } from "@/registry/registry"
import type { AddSummary } from "@/registry/types"

export async function addCommand(registry: Registry, paths: string[]): Promise<void> {
	printOutcome(await addRepos(registry, paths))
}

export async function addRepos(
	registry: Registry,
	paths: readonly string[],
): Promise<CommandResult<AddSummary>> {
	const result = await registry.add(paths)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	for (const candidate of result.value.skipped) {
		consola.warn(
			`Skipped "${candidate}": paths and names with commas or line breaks cannot be registered.`,
		)
	}

	if (result.value.added.length === 0) {
		return CommandResult.unchanged("No new repos found!")
	}

	consola.success(`Found ${result.value.added.length} new repo(s).`)
	return CommandResult.completed(result.value)
}
