import type { AbsolutePath, Result } from "@gitfleet/core"
import chalk, { type ChalkInstance } from "chalk"
import type { GitQueryError, SpawnError } from "@/types/errors"
import type { GitQueryRunner } from "@/utils/git"

export const PROBE_IDS = ["branch", "commit_msg", "path"] as const

export type ProbeId = (typeof PROBE_IDS)[number]

export const DEFAULT_PROBE_IDS: readonly ProbeId[] = ["branch", "commit_msg"]

export type ProbeError = SpawnError | GitQueryError

export type ProbeResult = Result<string, ProbeError>

export interface StatusProbe {
	id: ProbeId
	description: string
	run(repoPath: AbsolutePath): Promise<ProbeResult>
}

/** How the local branch relates to its upstream. */
export type RemoteSituation = "no-remote" | "in-sync" | "ahead" | "behind" | "diverged"

export const SITUATION_COLORS: Record<RemoteSituation, "white" | "green" | "magenta" | "yellow" | "red"> = {
	ahead: "magenta",
	behind: "yellow",
	diverged: "red",
	"in-sync": "green",
	"no-remote": "white",
}

export interface ProbeOptions {
	git: GitQueryRunner
	colors?: ChalkInstance
}

/**
 * Probes in display order. Each queries one repository and returns a short token.
 */
export function createStatusProbes(options: ProbeOptions): Record<ProbeId, StatusProbe> {
	const colors = options.colors ?? chalk
	const { git } = options

	return {
		branch: {
			description: "current branch, coloured by remote status, with local change markers",
			id: "branch",
			run: async (repoPath) => {
				const head = await branchName(git, repoPath)
				if (!head.ok) {
					return head
				}

				const markers = await localChangeMarkers(git, repoPath)
				if (!markers.ok) {
					return markers
				}

				const situation = await remoteSituation(git, repoPath)
				if (!situation.ok) {
					return situation
				}

				const label = `${head.value} ${markers.value}`.padEnd(10)
				return { ok: true, value: colors[SITUATION_COLORS[situation.value]](label) }
			},
		},
		commit_msg: {
			description: "subject of the latest commit",
			id: "commit_msg",
			run: async (repoPath) => {
				const subject = await git(repoPath, ["show", "-s", "--format=%s"])
				if (!subject.ok) {
					return subject
				}
				return { ok: true, value: subject.value.stdout.trim() }
			},
		},
		path: {
			description: "repository path",
			id: "path",
			run: async (repoPath) => ({ ok: true, value: repoPath }),
		},
	}
}

/**
 * Name of the checked-out branch, `HEAD` when detached. A branch without commits
 * yet has no revision to parse, so its name comes from the symbolic ref.
 */
export async function branchName(git: GitQueryRunner, repoPath: AbsolutePath): Promise<ProbeResult> {
	const head = await git(repoPath, ["rev-parse", "--abbrev-ref", "HEAD"])
	if (!head.ok) {
		return head
	}
	if (head.value.exitCode === 0) {
		return { ok: true, value: head.value.stdout.trim() }
	}

	const symbolic = await git(repoPath, ["symbolic-ref", "--short", "HEAD"])
	if (!symbolic.ok) {
		return symbolic
	}
	return { ok: true, value: symbolic.value.exitCode === 0 ? symbolic.value.stdout.trim() : "HEAD" }
}

/**
 * `*` unstaged changes, `+` staged changes, `_` untracked files.
 */
export async function localChangeMarkers(
	git: GitQueryRunner,
	repoPath: AbsolutePath,
): Promise<ProbeResult> {
	const unstaged = await git(repoPath, ["diff", "--quiet"])
	if (!unstaged.ok) {
		return unstaged
	}

	const staged = await git(repoPath, ["diff", "--cached", "--quiet"])
	if (!staged.ok) {
		return staged
	}

	// One entry per untracked directory rather than per file inside it.
	const untracked = await git(repoPath, [
		"ls-files",
		"-zo",
		"--exclude-standard",
		"--directory",
		"--no-empty-directory",
	])
	if (!untracked.ok) {
		return untracked
	}

	const markers = [
		unstaged.value.exitCode !== 0 ? "*" : "",
		staged.value.exitCode !== 0 ? "+" : "",
		untracked.value.stdout.length > 0 ? "_" : "",
	].join("")
	return { ok: true, value: markers }
}

export async function remoteSituation(
	git: GitQueryRunner,
	repoPath: AbsolutePath,
): Promise<Result<RemoteSituation, ProbeError>> {
	// 128: no upstream configured
	const vsUpstream = await git(repoPath, ["diff", "--quiet", "@{u}", "@{0}"])
	if (!vsUpstream.ok) {
		return vsUpstream
	}
	if (vsUpstream.value.exitCode === 128) {
		return { ok: true, value: "no-remote" }
	}
	if (vsUpstream.value.exitCode === 0) {
		return { ok: true, value: "in-sync" }
	}

	const base = await git(repoPath, ["merge-base", "@{0}", "@{u}"])
	if (!base.ok) {
		return base
	}
	const common = base.value.stdout.trim()

	const upstreamMoved = await git(repoPath, ["diff", "--quiet", "@{u}", common])
	if (!upstreamMoved.ok) {
		return upstreamMoved
	}
	if (upstreamMoved.value.exitCode === 0) {
		return { ok: true, value: "ahead" }
	}

	const localMoved = await git(repoPath, ["diff", "--quiet", "@{0}", common])
	if (!localMoved.ok) {
		return localMoved
	}
	return { ok: true, value: localMoved.value.exitCode === 0 ? "behind" : "diverged" }
}
