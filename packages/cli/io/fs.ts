import { appendFile, mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import { type AbsolutePath, assertAbsolutePathDirect } from "@gitfleet/core"
import type { IoResult } from "@/io/types"

// Re-export types for convenience
export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return {
			error: {
				message: `Unable to access ${targetPath}.`,
				operation: "stat",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return {
			error: {
				message: `Expected directory at ${targetPath}.`,
				operation: "mkdir",
				path: toAbsolutePath(targetPath),
				type: "io",
			},
			ok: false,
		}
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return {
				error: {
					message: `Unable to create ${targetPath}.`,
					operation: "mkdir",
					path: toAbsolutePath(targetPath),
					rawError: error instanceof Error ? error : undefined,
					type: "io",
				},
				ok: false,
			}
		}
	}

	return { ok: true, value: undefined }
}

/**
 * Reads a UTF-8 file, returning null when it does not exist.
 */
export async function readTextFileIfExists(
	targetPath: string,
): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return {
			error: {
				message: `Unable to read ${targetPath}.`,
				operation: "readFile",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

export async function appendTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const ensured = await ensureDir(path.dirname(targetPath))
	if (!ensured.ok) {
		return ensured
	}

	try {
		await appendFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return {
			error: {
				message: `Unable to append to ${targetPath}.`,
				operation: "appendFile",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

/**
 * Replaces a file's contents by writing a sibling temp file and renaming it into place.
 */
export async function replaceTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const ensured = await ensureDir(path.dirname(targetPath))
	if (!ensured.ok) {
		return ensured
	}

	const tempPath = `${targetPath}.tmp`
	try {
		await writeFile(tempPath, contents, "utf8")
		await rename(tempPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		const cleaned = await removeTempFile(tempPath)
		return {
			error: {
				message: cleaned
					? `Unable to write ${targetPath}.`
					: `Unable to write ${targetPath}; ${tempPath} was left behind.`,
				operation: "writeFile",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

/** False when the file is still there afterwards. */
async function removeTempFile(tempPath: string): Promise<boolean> {
	try {
		await rm(tempPath, { force: true })
		return true
	} catch {
		return false
	}
}

function toAbsolutePath(value: string): AbsolutePath {
	return assertAbsolutePathDirect(path.resolve(value))
}

function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	)
}
