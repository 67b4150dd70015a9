import { execFileSync } from "node:child_process"
import { afterEach, describe, expect, it, vi } from "vitest"
import { abs } from "@/tests/helpers"
import { createGitQuery, ensureGitAvailable, GIT_QUERY_MAX_BUFFER } from "@/utils/git"

const { execFileAsyncMock } = vi.hoisted(() => ({ execFileAsyncMock: vi.fn() }))

vi.mock("node:child_process", async () => {
	const { promisify } = await import("node:util")
	return {
		execFile: Object.assign(vi.fn(), { [promisify.custom]: execFileAsyncMock }),
		execFileSync: vi.fn(),
	}
})

const execFileSyncMock = vi.mocked(execFileSync)
const cwd = abs("/repos/api")

afterEach(() => {
	execFileAsyncMock.mockReset()
	execFileSyncMock.mockReset()
})

describe("createGitQuery", () => {
	it("returns stdout of a successful query", async () => {
		execFileAsyncMock.mockResolvedValue({ stderr: "", stdout: "main\n" })

		const result = await createGitQuery("git")(cwd, ["rev-parse", "--abbrev-ref", "HEAD"])

		expect(result).toEqual({ ok: true, value: { exitCode: 0, stdout: "main\n" } })
		expect(execFileAsyncMock).toHaveBeenCalledWith("git", ["rev-parse", "--abbrev-ref", "HEAD"], {
			cwd,
			encoding: "utf8",
			maxBuffer: GIT_QUERY_MAX_BUFFER,
		})
	})

	it("treats a non-zero exit as an answer", async () => {
		execFileAsyncMock.mockRejectedValue(
			Object.assign(new Error("Command failed"), { code: 128, stdout: "" }),
		)

		const result = await createGitQuery("git")(cwd, ["diff", "--quiet", "@{u}", "@{0}"])

		expect(result).toEqual({ ok: true, value: { exitCode: 128, stdout: "" } })
	})

	it("fails when git cannot be started", async () => {
		execFileAsyncMock.mockRejectedValue(
			Object.assign(new Error("spawn nogit ENOENT"), { code: "ENOENT", syscall: "spawn nogit" }),
		)

		const result = await createGitQuery("nogit")(cwd, ["status"])

		expect(result).toEqual({
			error: {
				command: "nogit status",
				message: `Failed to start "nogit status" in ${cwd}.`,
				path: cwd,
				rawError: new Error("spawn nogit ENOENT"),
				type: "spawn",
			},
			ok: false,
		})
	})
})

describe("createGitQuery output limits", () => {
	it("allows ten megabytes of output", () => {
		expect(GIT_QUERY_MAX_BUFFER).toBe(10 * 1024 * 1024)
	})

	it("reports output over the limit as a git failure, not a failed start", async () => {
		execFileAsyncMock.mockRejectedValue(
			Object.assign(new RangeError("stdout maxBuffer length exceeded"), {
				code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER",
				stdout: "x".repeat(2_000_000),
			}),
		)

		const result = await createGitQuery("git")(cwd, ["ls-files", "-zo"])

		expect(result).toEqual({
			error: {
				command: "git ls-files -zo",
				message: `"git ls-files -zo" in ${cwd} printed more than 10485760 bytes.`,
				path: cwd,
				rawError: new RangeError("stdout maxBuffer length exceeded"),
				type: "git",
			},
			ok: false,
		})
	})

	it("reports a query killed by a signal as a git failure", async () => {
		execFileAsyncMock.mockRejectedValue(
			Object.assign(new Error("Command failed"), { code: null, signal: "SIGTERM" }),
		)

		const result = await createGitQuery("git")(cwd, ["status"])

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("git")
			expect(result.error.message).toBe(`"git status" in ${cwd} did not finish.`)
		}
	})
})

describe("ensureGitAvailable", () => {
	it("passes when git answers --version", () => {
		execFileSyncMock.mockReturnValue(Buffer.from("git version 2.43.0\n"))

		expect(ensureGitAvailable("git")).toEqual({ ok: true, value: undefined })
		expect(execFileSyncMock).toHaveBeenCalledWith("git", ["--version"], { stdio: "ignore" })
	})

	it("fails when git is missing", () => {
		execFileSyncMock.mockImplementation(() => {
			throw new Error("ENOENT")
		})

		const result = ensureGitAvailable("nogit")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error).toMatchObject({
				field: "git",
				message: "nogit is not installed or not in PATH.",
				type: "validation",
			})
		}
	})
})
