import type { AbsolutePath, RepoName, Result } from "@gitfleet/core"
import type {
	ConflictError,
	IoError,
	NotFoundError,
	ValidationError,
} from "@/types/errors"

export interface RepoEntry {
	name: RepoName
	path: AbsolutePath
}

/** One well-formed `path,name` line of the store. */
export interface StoreRecord {
	line: number
	name: RepoName
	path: AbsolutePath
}

export interface StoreReadout {
	exists: boolean
	records: StoreRecord[]
	warnings: string[]
}

export interface RegistrySnapshot {
	repos: ReadonlyMap<RepoName, AbsolutePath>
	/** Stored records whose path is not a repository right now; kept on rewrite. */
	inactive: readonly StoreRecord[]
	storeExists: boolean
	warnings: readonly string[]
}

export interface AddSummary {
	added: RepoEntry[]
	skipped: string[]
}

export interface RemoveSummary {
	removed: RepoEntry[]
}

export type RegistryError = IoError | NotFoundError | ConflictError | ValidationError

export type RegistryResult<T> = Result<T, RegistryError>
