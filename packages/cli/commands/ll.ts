import type { AbsolutePath } from "@gitfleet/core"
import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { loadInfoItems } from "@/config/info"
import type { Registry } from "@/registry/registry"
import { describe } from "@/status/describe"
import { createStatusProbes, type ProbeOptions } from "@/status/probes"
import { createGitQuery, ensureGitAvailable } from "@/utils/git"

export async function llCommand(registry: Registry, infoFile: AbsolutePath): Promise<void> {
	const git = ensureGitAvailable()
	if (!git.ok) {
		printOutcome(CommandResult.failed(git.error))
		return
	}

	const result = await summarize(registry, infoFile, { git: createGitQuery() }, (line) =>
		consola.log(line),
	)
	printOutcome(result)
}

/**
 * Streams one status line per repo to `emit`, in name order.
 */
export async function summarize(
	registry: Registry,
	infoFile: AbsolutePath,
	probeOptions: ProbeOptions,
	emit: (line: string) => void,
): Promise<CommandResult<number>> {
	const loaded = await registry.load()
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	const items = await loadInfoItems(infoFile)
	if (!items.ok) {
		return CommandResult.failed(items.error)
	}

	const available = createStatusProbes(probeOptions)
	const probes = items.value.map((id) => available[id])

	let lines = 0
	for await (const line of describe(loaded.value.repos, probes)) {
		if (!line.ok) {
			return CommandResult.failed(line.error)
		}
		emit(line.value)
		lines += 1
	}

	if (lines === 0) {
		return CommandResult.unchanged("No repos are registered yet. Use `gitfleet add <path>`.")
	}
	return CommandResult.completed(lines)
}
