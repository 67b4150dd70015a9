import path from "node:path"
import {
	type AbsolutePath,
	coerceAbsolutePath,
	coerceRepoName,
	isStoreSafe,
	type RepoName,
} from "@gitfleet/core"
import { isRepository, type RepoDetector } from "@/registry/detect"
import { appendStore, readStore, rewriteStore } from "@/registry/store"
import type {
	AddSummary,
	RegistryResult,
	RegistrySnapshot,
	RemoveSummary,
	RepoEntry,
	StoreRecord,
} from "@/registry/types"
import type { NotFoundError } from "@/types/errors"

interface RegistryState {
	repos: Map<RepoName, AbsolutePath>
	inactive: StoreRecord[]
	storeExists: boolean
	warnings: string[]
}

export interface RegistryOptions {
	detect?: RepoDetector
}

/**
 * Collision-resolved view of the repo_path store.
 *
 * The store is read once per instance; later calls reuse that snapshot even if the
 * file changes underneath. Mutations go through the instance and keep the snapshot
 * in step with what they write.
 */
export class Registry {
	private readonly detect: RepoDetector
	private loading?: Promise<RegistryResult<RegistryState>>

	constructor(
		readonly storePath: AbsolutePath,
		options: RegistryOptions = {},
	) {
		this.detect = options.detect ?? isRepository
	}

	async load(): Promise<RegistryResult<RegistrySnapshot>> {
		return this.state()
	}

	/**
	 * Registers every candidate that is a repository and not registered yet (by path).
	 * New entries are named after their final path segment and appended to the store.
	 */
	async add(
		candidatePaths: readonly string[],
		cwd: string = process.cwd(),
	): Promise<RegistryResult<AddSummary>> {
		const loaded = await this.state()
		if (!loaded.ok) {
			return loaded
		}

		const state = loaded.value
		const known = new Set<string>(state.repos.values())
		const added: RepoEntry[] = []
		const skipped: string[] = []

		for (const candidate of candidatePaths) {
			const repoPath = coerceAbsolutePath(candidate, cwd)
			if (!repoPath) {
				skipped.push(candidate)
				continue
			}

			const name = coerceRepoName(path.basename(repoPath))
			if (!isStoreSafe(repoPath) || !name) {
				skipped.push(candidate)
				continue
			}

			if (known.has(repoPath)) {
				continue
			}

			const detected = await this.detect(repoPath)
			if (!detected.ok) {
				return detected
			}
			if (!detected.value) {
				continue
			}

			known.add(repoPath)
			added.push({ name, path: repoPath })
		}

		if (added.length > 0) {
			const appended = await appendStore(this.storePath, added)
			if (!appended.ok) {
				return appended
			}

			state.storeExists = true
			for (const entry of added) {
				state.repos.set(resolveCollision(state.repos, entry.name, entry.path), entry.path)
			}
		}

		return { ok: true, value: { added, skipped } }
	}

	/**
	 * Moves `oldName`'s path under `newName` and rewrites the whole store.
	 */
	async rename(oldName: string, newName: string): Promise<RegistryResult<RepoEntry>> {
		const loaded = await this.state()
		if (!loaded.ok) {
			return loaded
		}

		const state = loaded.value
		const repoPath = lookup(state.repos, oldName)
		if (!repoPath.ok) {
			return repoPath
		}

		const name = coerceRepoName(newName)
		if (!name) {
			return {
				error: {
					field: "name",
					message: `"${newName}" is not a valid repo name. Names must be non-empty and contain no commas, line breaks, or surrounding whitespace.`,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}

		if (state.repos.has(name)) {
			return {
				error: {
					message: `A repo named "${name}" is already registered.`,
					path: state.repos.get(name),
					target: name,
					type: "conflict",
				},
				ok: false,
			}
		}

		const next = new Map(state.repos)
		next.delete(repoPath.value.name)
		next.set(name, repoPath.value.path)

		const written = await this.persist(next, state.inactive)
		if (!written.ok) {
			return written
		}

		state.repos = next
		state.storeExists = true
		return { ok: true, value: { name, path: repoPath.value.path } }
	}

	/**
	 * Unregisters repos and rewrites the whole store. Nothing happens when the store
	 * has never been written.
	 */
	async remove(names: readonly string[]): Promise<RegistryResult<RemoveSummary>> {
		const loaded = await this.state()
		if (!loaded.ok) {
			return loaded
		}

		const state = loaded.value
		if (!state.storeExists) {
			return { ok: true, value: { removed: [] } }
		}

		const removed: RepoEntry[] = []
		for (const name of new Set(names)) {
			const entry = lookup(state.repos, name)
			if (!entry.ok) {
				return entry
			}
			removed.push(entry.value)
		}

		const next = new Map(state.repos)
		for (const entry of removed) {
			next.delete(entry.name)
		}

		const written = await this.persist(next, state.inactive)
		if (!written.ok) {
			return written
		}

		state.repos = next
		return { ok: true, value: { removed } }
	}

	private async state(): Promise<RegistryResult<RegistryState>> {
		if (!this.loading) {
			this.loading = this.readState()
		}
		return this.loading
	}

	private async persist(
		repos: ReadonlyMap<RepoName, AbsolutePath>,
		inactive: readonly StoreRecord[],
	) {
		const entries: RepoEntry[] = [
			...Array.from(repos, ([name, repoPath]) => ({ name, path: repoPath })),
			...inactive.map((record) => ({ name: record.name, path: record.path })),
		]
		return rewriteStore(this.storePath, entries)
	}

	private async readState(): Promise<RegistryResult<RegistryState>> {
		const readout = await readStore(this.storePath)
		if (!readout.ok) {
			return readout
		}

		const repos = new Map<RepoName, AbsolutePath>()
		const inactive: StoreRecord[] = []
		const warnings = [...readout.value.warnings]
		const seen = new Set<string>()

		for (const record of readout.value.records) {
			const detected = await this.detect(record.path)
			if (!detected.ok) {
				return detected
			}
			if (!detected.value) {
				inactive.push(record)
				continue
			}

			// Keyed by name and path, since an earlier collision may have re-keyed the first copy.
			const identity = `${record.name}\0${record.path}`
			if (seen.has(identity)) {
				warnings.push(
					`Skipping line ${record.line} of ${this.storePath}: "${record.name}" is already registered at ${record.path}.`,
				)
				continue
			}
			seen.add(identity)

			repos.set(resolveCollision(repos, record.name, record.path), record.path)
		}

		return {
			ok: true,
			value: { inactive, repos, storeExists: readout.value.exists, warnings },
		}
	}
}

/**
 * Picks a free key for `name`. A taken name is prefixed with the repo's parent
 * directory, then further ancestors; once the path runs out, `~2`, `~3`, ... is appended.
 */
export function resolveCollision(
	taken: ReadonlyMap<string, unknown>,
	name: RepoName,
	repoPath: AbsolutePath,
): RepoName {
	let key: string = name
	let dir = path.dirname(repoPath)

	while (taken.has(key)) {
		const segment = path.basename(dir)
		if (!segment) {
			break
		}
		key = `${segment}/${key}`
		dir = path.dirname(dir)
	}

	if (taken.has(key)) {
		let suffix = 2
		while (taken.has(`${key}~${suffix}`)) {
			suffix += 1
		}
		key = `${key}~${suffix}`
	}

	return key as RepoName
}

/**
 * Restricts the registry to `names`, in the order given. Repeated names count once.
 */
export function selectRepos(
	repos: ReadonlyMap<RepoName, AbsolutePath>,
	names: readonly string[],
): { ok: true; value: RepoEntry[] } | { ok: false; error: NotFoundError } {
	const selected: RepoEntry[] = []
	for (const name of new Set(names)) {
		const entry = lookup(repos, name)
		if (!entry.ok) {
			return entry
		}
		selected.push(entry.value)
	}
	return { ok: true, value: selected }
}

export function listRepos(repos: ReadonlyMap<RepoName, AbsolutePath>): RepoEntry[] {
	return Array.from(repos, ([name, repoPath]) => ({ name, path: repoPath }))
}

function lookup(
	repos: ReadonlyMap<RepoName, AbsolutePath>,
	name: string,
): { ok: true; value: RepoEntry } | { ok: false; error: NotFoundError } {
	for (const [key, repoPath] of repos) {
		if (key === name) {
			return { ok: true, value: { name: key, path: repoPath } }
		}
	}

	return {
		error: {
			message: `Repo "${name}" is not registered.`,
			target: name,
			type: "not_found",
		},
		ok: false,
	}
}
