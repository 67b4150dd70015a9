import { mkdir, readdir } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { replaceTextFile } from "@/io/fs"
import { readText, withTempDir, writeText } from "@/tests/helpers"
import "@/tests/helpers/assertions"

describe("replaceTextFile", () => {
	it("replaces the contents and leaves no temp file", async () => {
		await withTempDir(async (dir) => {
			const file = join(dir, "repo_path")
			await writeText(file, "/old,old\n")

			const result = await replaceTextFile(file, "/new,new\n")

			expect(result).toBeOk()
			expect(await readText(file)).toBe("/new,new\n")
			expect(await readdir(dir)).toEqual(["repo_path"])
		})
	})

	it("returns an io error when the temp file cannot be written or removed", async () => {
		await withTempDir(async (dir) => {
			const file = join(dir, "repo_path")
			const tempPath = `${file}.tmp`
			await writeText(file, "/old,old\n")
			await mkdir(join(tempPath, "inner"), { recursive: true })

			const result = await replaceTextFile(file, "/new,new\n")

			expect(result).toBeErr()
			if (!result.ok) {
				expect(result.error).toMatchObject({
					message: `Unable to write ${file}; ${tempPath} was left behind.`,
					operation: "writeFile",
					path: file,
					type: "io",
				})
			}
			expect(await readText(file)).toBe("/old,old\n")
		})
	})
})
