import { join } from "node:path"
import { consola } from "consola"
import { afterEach, describe, expect, it, vi } from "vitest"
import { infoCommand, infoItems } from "@/commands/info"
import { abs, withTempDir, writeText } from "@/tests/helpers"

afterEach(() => {
	vi.restoreAllMocks()
})

describe("infoItems", () => {
	it("splits probes into those in use and the rest", async () => {
		await withTempDir(async (dir) => {
			const file = abs(join(dir, "info.toml"))
			await writeText(file, 'items = ["path"]\n')

			expect(await infoItems(file)).toEqual({
				status: "completed",
				value: { inUse: ["path"], unused: ["branch", "commit_msg"] },
			})
		})
	})
})

describe("infoCommand", () => {
	it("prints the defaults when nothing is configured", async () => {
		const log = vi.spyOn(consola, "log").mockImplementation(() => {})

		await withTempDir(async (dir) => {
			await infoCommand(abs(join(dir, "info.toml")))
		})

		expect(log.mock.calls).toEqual([["In use: branch,commit_msg"], ["Unused: path"]])
	})

	it("omits the unused line when every probe is shown", async () => {
		const log = vi.spyOn(consola, "log").mockImplementation(() => {})

		await withTempDir(async (dir) => {
			const file = abs(join(dir, "info.toml"))
			await writeText(file, 'items = ["commit_msg", "path", "branch"]\n')
			await infoCommand(file)
		})

		expect(log.mock.calls).toEqual([["In use: commit_msg,path,branch"]])
	})
})
