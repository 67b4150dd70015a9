import type { AbsolutePath } from "@gitfleet/core"
import {
	type DispatchOutput,
	type DispatchPlan,
	type DispatchStrategy,
	type DispatchSummary,
	type ProcessRunner,
	type SpawnResult,
	succeeded,
} from "@/dispatch/types"

export function chooseStrategy(plan: DispatchPlan): DispatchStrategy {
	if (plan.targets.length === 1 || !plan.allowConcurrent) {
		return "serial"
	}
	return "concurrent"
}

/**
 * Runs one command in every target repository.
 *
 * Concurrent runs cannot prompt, so any target whose concurrent run fails is run
 * again with the terminal attached once every concurrent run has finished.
 */
export class Dispatcher {
	constructor(
		private readonly runner: ProcessRunner,
		private readonly output: DispatchOutput,
	) {}

	async run(plan: DispatchPlan): Promise<SpawnResult<DispatchSummary>> {
		const strategy = chooseStrategy(plan)
		const paths = plan.targets.map((target) => target.path)

		if (strategy === "serial") {
			const serial = await this.runSerial(plan.argv, paths)
			if (!serial.ok) {
				return serial
			}
			return { ok: true, value: { failed: [], invocations: paths.length, strategy } }
		}

		const concurrent = await this.runConcurrent(plan.argv, paths)
		if (!concurrent.ok) {
			return concurrent
		}

		const failed = concurrent.value
		const retried = await this.runSerial(plan.argv, failed)
		if (!retried.ok) {
			return retried
		}

		return {
			ok: true,
			value: { failed, invocations: paths.length + failed.length, strategy },
		}
	}

	private async runSerial(
		argv: readonly string[],
		paths: readonly AbsolutePath[],
	): Promise<SpawnResult<void>> {
		for (const repoPath of paths) {
			this.output.target(repoPath)
			const run = await this.runner.runAttached(argv, repoPath)
			if (!run.ok) {
				return run
			}
		}
		return { ok: true, value: undefined }
	}

	/** Resolves with the failed targets, in target order, after every run has settled. */
	private async runConcurrent(
		argv: readonly string[],
		paths: readonly AbsolutePath[],
	): Promise<SpawnResult<AbsolutePath[]>> {
		const outcomes = await Promise.all(
			paths.map(async (repoPath) => {
				const run = await this.runner.runCaptured(argv, repoPath)
				if (run.ok) {
					this.output.captured(repoPath, run.value)
				}
				return { repoPath, run }
			}),
		)

		const failed: AbsolutePath[] = []
		for (const { repoPath, run } of outcomes) {
			if (!run.ok) {
				return run
			}
			if (!succeeded(run.value)) {
				failed.push(repoPath)
			}
		}
		return { ok: true, value: failed }
	}
}
