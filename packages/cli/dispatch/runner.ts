import { spawn } from "node:child_process"
import type { AbsolutePath } from "@gitfleet/core"
import type { CapturedRun, ProcessExit, ProcessRunner, SpawnResult } from "@/dispatch/types"
import { GITFLEET_GIT } from "@/env"

export function createProcessRunner(executable: string = GITFLEET_GIT): ProcessRunner {
	return {
		runAttached: (argv, cwd) =>
			new Promise<SpawnResult<ProcessExit>>((resolve) => {
				try {
					const child = spawn(executable, [...argv], { cwd, stdio: "inherit" })

					child.on("error", (error) => {
						resolve(spawnFailure(executable, argv, cwd, error))
					})

					child.on("close", (exitCode, signal) => {
						resolve({ ok: true, value: { exitCode, signal } })
					})
				} catch (error) {
					resolve(spawnFailure(executable, argv, cwd, error))
				}
			}),

		runCaptured: (argv, cwd) =>
			new Promise<SpawnResult<CapturedRun>>((resolve) => {
				try {
					// Own process group: the terminal's Ctrl-C reaches only attached runs.
					const child = spawn(executable, [...argv], {
						cwd,
						detached: true,
						stdio: ["ignore", "pipe", "pipe"],
					})
					const stdout: Buffer[] = []
					const stderr: Buffer[] = []

					child.stdout?.on("data", (chunk: Buffer) => {
						stdout.push(chunk)
					})
					child.stderr?.on("data", (chunk: Buffer) => {
						stderr.push(chunk)
					})

					child.on("error", (error) => {
						resolve(spawnFailure(executable, argv, cwd, error))
					})

					child.on("close", (exitCode, signal) => {
						resolve({
							ok: true,
							value: {
								exitCode,
								signal,
								stderr: Buffer.concat(stderr).toString("utf8"),
								stdout: Buffer.concat(stdout).toString("utf8"),
							},
						})
					})
				} catch (error) {
					resolve(spawnFailure(executable, argv, cwd, error))
				}
			}),
	}
}

function spawnFailure(
	executable: string,
	argv: readonly string[],
	cwd: AbsolutePath,
	error: unknown,
): SpawnResult<never> {
	const command = [executable, ...argv].join(" ")
	return {
		error: {
			command,
			message: `Failed to start "${command}" in ${cwd}.`,
			path: cwd,
			rawError: error instanceof Error ? error : undefined,
			type: "spawn",
		},
		ok: false,
	}
}
