import type { AbsolutePath } from "@gitfleet/core"
import { consola } from "consola"
import { type CapturedRun, type DispatchOutput, succeeded } from "@/dispatch/types"

interface Writable {
	write(chunk: string): unknown
}

export function createConsoleOutput(
	stdout: Writable = process.stdout,
	stderr: Writable = process.stderr,
): DispatchOutput {
	return {
		captured: (repoPath: AbsolutePath, run: CapturedRun) => {
			consola.log(repoPath)
			if (run.stdout) {
				stdout.write(run.stdout)
			}
			if (run.stderr) {
				stderr.write(run.stderr)
			}
			if (!succeeded(run)) {
				consola.warn(`${describeExit(run)}; rerunning with the terminal attached.`)
			}
		},
		target: (repoPath: AbsolutePath) => {
			consola.log(repoPath)
		},
	}
}

export function describeExit(run: CapturedRun): string {
	if (run.signal) {
		return `Killed by ${run.signal}`
	}
	return `Exited with code ${run.exitCode}`
}
