import { execFile, execFileSync } from "node:child_process"
import { promisify } from "node:util"
import type { AbsolutePath, Result } from "@gitfleet/core"
import { GITFLEET_GIT } from "@/env"
import type { GitQueryError, SpawnError, ValidationError } from "@/types/errors"

const execFileAsync = promisify(execFile)

export interface GitQuery {
	exitCode: number
	stdout: string
}

export type GitQueryRunner = (
	cwd: AbsolutePath,
	args: readonly string[],
) => Promise<Result<GitQuery, SpawnError | GitQueryError>>

/** Largest stdout a query may produce. */
export const GIT_QUERY_MAX_BUFFER = 10 * 1024 * 1024

export function ensureGitAvailable(
	executable: string = GITFLEET_GIT,
): Result<void, ValidationError> {
	try {
		execFileSync(executable, ["--version"], { stdio: "ignore" })
		return { ok: true, value: undefined }
	} catch (error) {
		return {
			error: {
				field: "git",
				message: `${executable} is not installed or not in PATH.`,
				rawError: error instanceof Error ? error : undefined,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}
}

/**
 * Runs a read-only git command and reports its exit code. A non-zero exit is an
 * answer (no upstream, differences found), not an error.
 */
export function createGitQuery(executable: string = GITFLEET_GIT): GitQueryRunner {
	return async (cwd, args) => {
		try {
			const { stdout } = await execFileAsync(executable, [...args], {
				cwd,
				encoding: "utf8",
				maxBuffer: GIT_QUERY_MAX_BUFFER,
			})
			return { ok: true, value: { exitCode: 0, stdout } }
		} catch (error) {
			const exitCode = exitCodeOf(error)
			if (exitCode !== null) {
				return { ok: true, value: { exitCode, stdout: stdoutOf(error) } }
			}

			const command = [executable, ...args].join(" ")
			const rawError = error instanceof Error ? error : undefined
			if (isSpawnFailure(error)) {
				return {
					error: {
						command,
						message: `Failed to start "${command}" in ${cwd}.`,
						path: cwd,
						rawError,
						type: "spawn",
					},
					ok: false,
				}
			}

			return {
				error: {
					command,
					message: isOutputOverflow(error)
						? `"${command}" in ${cwd} printed more than ${GIT_QUERY_MAX_BUFFER} bytes.`
						: `"${command}" in ${cwd} did not finish.`,
					path: cwd,
					rawError,
					type: "git",
				},
				ok: false,
			}
		}
	}
}

// execFile rejects with `code` set to the exit status, to an errno string when the
// process never started, or to an ERR_ code when Node gave up on it.
function exitCodeOf(error: unknown): number | null {
	if (typeof error === "object" && error !== null && "code" in error) {
		return typeof error.code === "number" ? error.code : null
	}
	return null
}

function isSpawnFailure(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"syscall" in error &&
		typeof error.syscall === "string" &&
		error.syscall.startsWith("spawn")
	)
}

function isOutputOverflow(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER"
	)
}

function stdoutOf(error: unknown): string {
	if (typeof error === "object" && error !== null && "stdout" in error) {
		return typeof error.stdout === "string" ? error.stdout : ""
	}
	return ""
}
