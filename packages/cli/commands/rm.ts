import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import type { Registry } from "@/registry/registry"
import type { RemoveSummary } from "@/registry/types"

export async function rmCommand(registry: Registry, names: string[]): Promise<void> {
	printOutcome(await removeRepos(registry, names))
}

export async function removeRepos(
	registry: Registry,
	names: readonly string[],
): Promise<CommandResult<RemoveSummary>> {
	const result = await registry.remove(names)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	if (result.value.removed.length === 0) {
		return CommandResult.unchanged("No repos are registered yet.")
	}

	consola.success(`Removed ${result.value.removed.length} repo(s).`)
	return CommandResult.completed(result.value)
}
