import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { loadInfoItems } from "@/config/info"
import { abs, withTempDir, writeText } from "@/tests/helpers"
import "@/tests/helpers/assertions"

describe("loadInfoItems", () => {
	it("shows branch and commit message when there is no file", async () => {
		await withTempDir(async (dir) => {
			const items = await loadInfoItems(abs(join(dir, "info.toml")))

			expect(items).toEqual({ ok: true, value: ["branch", "commit_msg"] })
		})
	})

	it("keeps the configured order", async () => {
		await withTempDir(async (dir) => {
			const file = abs(join(dir, "info.toml"))
			await writeText(file, 'items = ["path", "branch"]\n')

			expect(await loadInfoItems(file)).toEqual({ ok: true, value: ["path", "branch"] })
		})
	})

	it("allows an empty list", async () => {
		await withTempDir(async (dir) => {
			const file = abs(join(dir, "info.toml"))
			await writeText(file, "items = []\n")

			expect(await loadInfoItems(file)).toEqual({ ok: true, value: [] })
		})
	})

	it("rejects unknown and repeated items", async () => {
		await withTempDir(async (dir) => {
			const unknown = abs(join(dir, "unknown.toml"))
			const repeated = abs(join(dir, "repeated.toml"))
			await writeText(unknown, 'items = ["branch", "author"]\n')
			await writeText(repeated, 'items = ["path", "path"]\n')

			expect(await loadInfoItems(unknown)).toBeErrContaining("items.1")
			expect(await loadInfoItems(repeated)).toBeErrContaining(
				"Invalid info: items: items must not repeat.",
			)
		})
	})
})
