import type { AbsolutePath, Result } from "@gitfleet/core"
import { z } from "zod"
import { type ConfigError, parseTomlConfig } from "@/config/toml"
import { readTextFileIfExists } from "@/io/fs"

export interface CommandAlias {
	name: string
	/** git arguments, without the executable */
	argv: string[]
	help: string
	allowAll: boolean
	disableAsync: boolean
}

export type CommandAliases = ReadonlyMap<string, CommandAlias>

/** Names taken by gitfleet's own sub-commands. */
export const RESERVED_COMMANDS: ReadonlySet<string> = new Set([
	"add",
	"help",
	"info",
	"ll",
	"ls",
	"rename",
	"rm",
	"super",
])

const COMMAND_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const commandSchema = z
	.object({
		allow_all: z.boolean().optional(),
		cmd: trimmedString("cmd").optional(),
		disable_async: z.boolean().optional(),
		help: trimmedString("help"),
	})
	.strict()

const commandsSchema = z.record(commandSchema).superRefine((value, ctx) => {
	for (const name of Object.keys(value)) {
		if (!COMMAND_NAME.test(name)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "Command names may only contain letters, digits, '-' and '_'.",
				path: [name],
			})
		} else if (RESERVED_COMMANDS.has(name)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `"${name}" is a built-in command and cannot be redefined.`,
				path: [name],
			})
		}
	}
})

type RawCommands = z.output<typeof commandsSchema>

export function parseCommandAliases(
	contents: string,
	sourcePath: AbsolutePath,
): Result<Map<string, CommandAlias>, ConfigError> {
	const parsed = parseTomlConfig(contents, sourcePath, commandsSchema, "commands")
	if (!parsed.ok) {
		return parsed
	}
	return { ok: true, value: toAliases(parsed.value) }
}

/**
 * User entries replace default entries of the same name wholesale; fields are not merged.
 */
export function mergeCommandAliases(
	defaults: CommandAliases,
	overrides: CommandAliases,
): Map<string, CommandAlias> {
	const merged = new Map(defaults)
	for (const [name, alias] of overrides) {
		merged.set(name, alias)
	}
	return merged
}

/** Command verbs that must never run concurrently. */
export function concurrencyDenylist(aliases: CommandAliases): Set<string> {
	const denied = new Set<string>()
	for (const alias of aliases.values()) {
		if (alias.disableAsync) {
			denied.add(alias.name)
		}
	}
	return denied
}

export async function loadCommandAliases(paths: {
	defaults: AbsolutePath
	user: AbsolutePath
}): Promise<Result<Map<string, CommandAlias>, ConfigError>> {
	const defaults = await readCommandAliases(paths.defaults)
	if (!defaults.ok) {
		return defaults
	}

	const user = await readCommandAliases(paths.user)
	if (!user.ok) {
		return user
	}

	return { ok: true, value: mergeCommandAliases(defaults.value, user.value) }
}

/** A missing file defines no aliases. */
async function readCommandAliases(
	sourcePath: AbsolutePath,
): Promise<Result<Map<string, CommandAlias>, ConfigError>> {
	const contents = await readTextFileIfExists(sourcePath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: new Map() }
	}
	return parseCommandAliases(contents.value, sourcePath)
}

function toAliases(raw: RawCommands): Map<string, CommandAlias> {
	const aliases = new Map<string, CommandAlias>()
	for (const [name, entry] of Object.entries(raw)) {
		aliases.set(name, {
			allowAll: entry.allow_all ?? false,
			argv: (entry.cmd ?? name).split(/\s+/),
			disableAsync: entry.disable_async ?? false,
			help: entry.help,
			name,
		})
	}
	return aliases
}
