import type { AbsolutePath, Result } from "@gitfleet/core"
import type { RepoEntry } from "@/registry/types"
import type { SpawnError } from "@/types/errors"

export type DispatchStrategy = "serial" | "concurrent"

export interface DispatchPlan {
	/** Arguments after the executable, e.g. `["fetch", "--prune"]`. */
	argv: readonly string[]
	targets: readonly RepoEntry[]
	/** False for commands that may prompt on the terminal. */
	allowConcurrent: boolean
}

export interface ProcessExit {
	exitCode: number | null
	signal: NodeJS.Signals | null
}

export interface CapturedRun extends ProcessExit {
	stdout: string
	stderr: string
}

export type SpawnResult<T> = Result<T, SpawnError>

export interface ProcessRunner {
	/** Runs with the terminal attached; resolves once the process exits. */
	runAttached(argv: readonly string[], cwd: AbsolutePath): Promise<SpawnResult<ProcessExit>>
	/** Runs with stdin closed and output captured, in its own process group. */
	runCaptured(argv: readonly string[], cwd: AbsolutePath): Promise<SpawnResult<CapturedRun>>
}

export interface DispatchOutput {
	/** Announces a serial run in `repoPath`. */
	target(repoPath: AbsolutePath): void
	/** Emits one concurrent run's captured output as a single unit. */
	captured(repoPath: AbsolutePath, run: CapturedRun): void
}

export interface DispatchSummary {
	strategy: DispatchStrategy
	invocations: number
	/** Targets whose concurrent run failed and were re-run serially. */
	failed: AbsolutePath[]
}

export function succeeded(exit: ProcessExit): boolean {
	return exit.exitCode === 0
}
