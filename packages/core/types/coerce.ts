import path from "node:path"
import type { AbsolutePath, RepoName } from "./branded"

// The store is `path,name` per line, so neither field may carry the separator or a line break.
const STORE_UNSAFE_CHARS = /[,\r\n]/

export function isStoreSafe(value: string): boolean {
	return !STORE_UNSAFE_CHARS.test(value)
}

export function coerceRepoName(value: string): RepoName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (trimmed !== value) return null
	if (!isStoreSafe(trimmed)) return null
	return trimmed as RepoName
}

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return stripTrailingSeparator(resolved) as AbsolutePath
}

export function coerceAbsolutePathDirect(value: string): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return stripTrailingSeparator(path.normalize(trimmed)) as AbsolutePath
}

export function assertAbsolutePathDirect(value: string): AbsolutePath {
	const result = coerceAbsolutePathDirect(value)
	if (!result) {
		throw new Error(`Expected absolute path, got: ${value}`)
	}
	return result
}

function stripTrailingSeparator(value: string): string {
	const root = path.parse(value).root
	if (value === root) return value
	return value.endsWith(path.sep) ? value.slice(0, -1) : value
}
