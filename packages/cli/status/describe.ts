import type { AbsolutePath, RepoName } from "@gitfleet/core"
import type { ProbeResult, StatusProbe } from "@/status/probes"

/**
 * Yields one line per repository, sorted by name: the name padded to the widest
 * name, then every probe's output separated by single spaces. Stops at the first
 * probe that cannot run. Call again to start over.
 */
export async function* describe(
	repos: ReadonlyMap<RepoName, AbsolutePath>,
	probes: readonly StatusProbe[],
): AsyncGenerator<ProbeResult> {
	const names = [...repos.keys()].sort()
	const width = Math.max(0, ...names.map((name) => name.length)) + 1

	for (const name of names) {
		const repoPath = repos.get(name)
		if (repoPath === undefined) {
			continue
		}

		const items: string[] = []
		for (const probe of probes) {
			const item = await probe.run(repoPath)
			if (!item.ok) {
				yield item
				return
			}
			items.push(item.value)
		}

		yield { ok: true, value: `${name.padEnd(width)}${items.join(" ")}` }
	}
}
