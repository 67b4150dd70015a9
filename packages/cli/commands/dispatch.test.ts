import { join } from "node:path"
import { describe, expect, it } from "vitest"
import {
	buildDispatchPlan,
	type DispatchContext,
	dispatchCommand,
	splitSuperArgs,
	superDispatch,
} from "@/commands/dispatch"
import { Dispatcher } from "@/dispatch/dispatcher"
import { Registry } from "@/registry/registry"
import {
	abs,
	fakeDetector,
	fakeRunner,
	recordingOutput,
	repoName,
	withTempDir,
	writeText,
} from "@/tests/helpers"
import "@/tests/helpers/assertions"

const repos = new Map([
	[repoName("api"), abs("/a/api")],
	[repoName("web"), abs("/b/web")],
	[repoName("docs"), abs("/c/docs")],
])

describe("splitSuperArgs", () => {
	it("takes leading repo names as targets", () => {
		expect(splitSuperArgs(["api", "web", "checkout", "-b", "api"], repos)).toEqual({
			argv: ["checkout", "-b", "api"],
			names: ["api", "web"],
		})
	})

	it("targets every repo when the first word is not a repo", () => {
		expect(splitSuperArgs(["status", "--short"], repos)).toEqual({
			argv: ["status", "--short"],
			names: [],
		})
	})
})

describe("buildDispatchPlan", () => {
	it("targets every repo when no name is given", () => {
		const plan = buildDispatchPlan(repos, [], ["fetch"], new Set())

		expect(plan).toEqual({
			ok: true,
			value: {
				allowConcurrent: true,
				argv: ["fetch"],
				targets: [
					{ name: "api", path: "/a/api" },
					{ name: "web", path: "/b/web" },
					{ name: "docs", path: "/c/docs" },
				],
			},
		})
	})

	it("targets the named repos in the order given", () => {
		const plan = buildDispatchPlan(repos, ["docs", "api"], ["pull"], new Set())

		expect(plan.ok && plan.value.targets.map((target) => target.name)).toEqual(["docs", "api"])
	})

	it("turns concurrency off for denied verbs", () => {
		const plan = buildDispatchPlan(repos, [], ["log", "-3"], new Set(["log"]))

		expect(plan.ok && plan.value.allowConcurrent).toBe(false)
	})

	it("fails for an unregistered repo", () => {
		expect(buildDispatchPlan(repos, ["api", "mobile"], ["fetch"], new Set())).toBeErrContaining(
			'Repo \\"mobile\\" is not registered.',
		)
	})
})

async function contextWith(dir: string, runner: ReturnType<typeof fakeRunner>) {
	const store = abs(join(dir, "repo_path"))
	await writeText(store, "/a/api,api\n/b/web,web\n")
	const context: DispatchContext = {
		denylist: new Set(["log"]),
		dispatcher: new Dispatcher(runner, recordingOutput()),
		registry: new Registry(store, { detect: fakeDetector(["/a/api", "/b/web"]) }),
	}
	return context
}

describe("dispatchCommand", () => {
	it("runs the command in every repo", async () => {
		await withTempDir(async (dir) => {
			const runner = fakeRunner()
			const context = await contextWith(dir, runner)

			const result = await dispatchCommand(context, [], ["fetch"])

			expect(result).toEqual({
				status: "completed",
				value: { failed: [], invocations: 2, strategy: "concurrent" },
			})
			expect(runner.events.map((event) => event.kind)).toEqual(["captured", "captured"])
		})
	})

	it("runs serially when the alias forbids concurrency", async () => {
		await withTempDir(async (dir) => {
			const runner = fakeRunner()
			const context = await contextWith(dir, runner)

			const result = await dispatchCommand(context, [], ["difftool"], { serialOnly: true })

			expect(result.status === "completed" && result.value.strategy).toBe("serial")
			expect(runner.events.map((event) => event.kind)).toEqual(["attached", "attached"])
		})
	})

	it("fails before running anything when a repo is unknown", async () => {
		await withTempDir(async (dir) => {
			const runner = fakeRunner()
			const context = await contextWith(dir, runner)

			const result = await dispatchCommand(context, ["mobile"], ["fetch"])

			expect(result.status).toBe("failed")
			expect(runner.events).toEqual([])
		})
	})
})

describe("superDispatch", () => {
	it("runs the remaining words in the leading repos", async () => {
		await withTempDir(async (dir) => {
			const runner = fakeRunner()
			const context = await contextWith(dir, runner)

			await superDispatch(context, ["web", "checkout", "main"])

			expect(runner.events).toEqual([
				{ argv: ["checkout", "main"], kind: "attached", path: "/b/web" },
			])
		})
	})

	it("respects the denylist", async () => {
		await withTempDir(async (dir) => {
			const runner = fakeRunner()
			const context = await contextWith(dir, runner)

			await superDispatch(context, ["log", "--oneline"])

			expect(runner.events.map((event) => event.kind)).toEqual(["attached", "attached"])
		})
	})

	it("needs a git command after the repo names", async () => {
		await withTempDir(async (dir) => {
			const runner = fakeRunner()
			const context = await contextWith(dir, runner)

			const result = await superDispatch(context, ["api", "web"])

			expect(result).toEqual({
				error: {
					field: "command",
					message: "No git command given. Example: gitfleet super myrepo checkout main",
					source: "manual",
					type: "validation",
				},
				status: "failed",
			})
			expect(runner.events).toEqual([])
		})
	})
})
