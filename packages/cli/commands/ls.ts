import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { type Registry, selectRepos } from "@/registry/registry"

export async function lsCommand(registry: Registry, name?: string): Promise<void> {
	const result = await listing(registry, name)
	if (result.status === "completed") {
		consola.log(result.value)
	}
	printOutcome(result)
}

/**
 * Space-separated names of every repo, or the path of one.
 */
export async function listing(
	registry: Registry,
	name?: string,
): Promise<CommandResult<string>> {
	const loaded = await registry.load()
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	if (name === undefined) {
		return CommandResult.completed([...loaded.value.repos.keys()].join(" "))
	}

	const selected = selectRepos(loaded.value.repos, [name])
	if (!selected.ok) {
		return CommandResult.failed(selected.error)
	}
	return CommandResult.completed(selected.value.map((entry) => entry.path).join("\n"))
}
