import type { AbsolutePath } from "@gitfleet/core"
import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { loadInfoItems } from "@/config/info"
import { PROBE_IDS, type ProbeId } from "@/status/probes"

export async function infoCommand(infoFile: AbsolutePath): Promise<void> {
	const result = await infoItems(infoFile)
	if (result.status === "completed") {
		consola.log(`In use: ${result.value.inUse.join(",")}`)
		if (result.value.unused.length > 0) {
			consola.log(`Unused: ${result.value.unused.join(" ")}`)
		}
	}
	printOutcome(result)
}

export async function infoItems(
	infoFile: AbsolutePath,
): Promise<CommandResult<{ inUse: ProbeId[]; unused: ProbeId[] }>> {
	const items = await loadInfoItems(infoFile)
	if (!items.ok) {
		return CommandResult.failed(items.error)
	}

	const inUse = items.value
	const unused = PROBE_IDS.filter((id) => !inUse.includes(id))
	return CommandResult.completed({ inUse, unused })
}
