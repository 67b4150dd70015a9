/**
 * @gitfleet/core
 *
 * Shared constants, branded types, and pure helpers for repository registration.
 */

export {
	COMMANDS_FILENAME,
	CONFIG_DIRNAME,
	GIT_MARKER,
	INFO_FILENAME,
	REPO_PATH_FILENAME,
	STORE_FIELD_SEPARATOR,
} from "./constants"
export type { AbsolutePath, RepoName } from "./types/branded"
export {
	assertAbsolutePathDirect,
	coerceAbsolutePath,
	coerceAbsolutePathDirect,
	coerceRepoName,
	isStoreSafe,
} from "./types/coerce"
export type { BaseError, Result } from "./types/error"
