import {
	coerceAbsolutePathDirect,
	coerceRepoName,
	STORE_FIELD_SEPARATOR,
} from "@gitfleet/core"
import { appendTextFile, readTextFileIfExists, replaceTextFile } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { RepoEntry, StoreReadout, StoreRecord } from "@/registry/types"

// The store holds one `<absolute-path>,<name>` line per repository. Nothing is escaped,
// so a line that does not split into exactly two usable fields is skipped with a warning.

export function parseStore(
	contents: string,
	source: string,
): Pick<StoreReadout, "records" | "warnings"> {
	const records: StoreRecord[] = []
	const warnings: string[] = []

	contents.split(/\r?\n/).forEach((raw, index) => {
		const line = raw.trimEnd()
		if (!line) {
			return
		}

		const lineNumber = index + 1
		const fields = line.split(STORE_FIELD_SEPARATOR)
		if (fields.length !== 2) {
			warnings.push(
				`Skipping line ${lineNumber} of ${source}: expected "<path>${STORE_FIELD_SEPARATOR}<name>".`,
			)
			return
		}

		const [rawPath, rawName] = fields
		const repoPath = coerceAbsolutePathDirect(rawPath ?? "")
		if (!repoPath) {
			warnings.push(
				`Skipping line ${lineNumber} of ${source}: "${rawPath}" is not an absolute path.`,
			)
			return
		}

		const name = coerceRepoName(rawName ?? "")
		if (!name) {
			warnings.push(
				`Skipping line ${lineNumber} of ${source}: "${rawName}" is not a valid repo name.`,
			)
			return
		}

		records.push({ line: lineNumber, name, path: repoPath })
	})

	return { records, warnings }
}

export function serializeStore(entries: readonly RepoEntry[]): string {
	return entries
		.map((entry) => `${entry.path}${STORE_FIELD_SEPARATOR}${entry.name}\n`)
		.join("")
}

export async function readStore(filePath: string): Promise<IoResult<StoreReadout>> {
	const contents = await readTextFileIfExists(filePath)
	if (!contents.ok) {
		return contents
	}

	if (contents.value === null) {
		return { ok: true, value: { exists: false, records: [], warnings: [] } }
	}

	return {
		ok: true,
		value: { exists: true, ...parseStore(contents.value, filePath) },
	}
}

export async function appendStore(
	filePath: string,
	entries: readonly RepoEntry[],
): Promise<IoResult<void>> {
	const existing = await readTextFileIfExists(filePath)
	if (!existing.ok) {
		return existing
	}

	// A hand-edited store may lack its final newline.
	const lead = existing.value && !existing.value.endsWith("\n") ? "\n" : ""
	return appendTextFile(filePath, lead + serializeStore(entries))
}

export async function rewriteStore(
	filePath: string,
	entries: readonly RepoEntry[],
): Promise<IoResult<void>> {
	return replaceTextFile(filePath, serializeStore(entries))
}
