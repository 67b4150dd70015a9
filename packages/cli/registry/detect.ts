import path from "node:path"
import { GIT_MARKER } from "@gitfleet/core"
import { safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"

export type RepoDetector = (repoPath: string) => Promise<IoResult<boolean>>

/**
 * A directory is a repository when it holds a `.git` entry. Regular clones have a
 * directory there; worktrees and submodules have a file pointing at the real git dir.
 */
export async function isRepository(repoPath: string): Promise<IoResult<boolean>> {
	const marker = await safeStat(path.join(repoPath, GIT_MARKER))
	if (!marker.ok) {
		return marker
	}

	return { ok: true, value: marker.value !== null }
}
