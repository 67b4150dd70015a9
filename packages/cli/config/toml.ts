import type { AbsolutePath, Result } from "@gitfleet/core"
import { parse, TomlError } from "smol-toml"
import type { z } from "zod"
import { readTextFileIfExists } from "@/io/fs"
import type { IoError, ParseError, ValidationError } from "@/types/errors"

export type ConfigError = IoError | ParseError | ValidationError

export function parseTomlConfig<S extends z.ZodTypeAny>(
	contents: string,
	sourcePath: AbsolutePath,
	schema: S,
	field: string,
): Result<z.output<S>, ConfigError> {
	let data: unknown
	try {
		data = parse(contents)
	} catch (error) {
		return {
			error: {
				message:
					error instanceof TomlError
						? `Invalid TOML: ${error.message}`
						: "Invalid TOML.",
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: field,
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = schema.safeParse(data)
	if (!parsed.success) {
		return {
			error: {
				field,
				message: formatZodError(parsed.error, field),
				path: sourcePath,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: parsed.data }
}

/**
 * Like parseTomlConfig, for a file that may not exist (null).
 */
export async function readTomlConfig<S extends z.ZodTypeAny>(
	sourcePath: AbsolutePath,
	schema: S,
	field: string,
): Promise<Result<z.output<S> | null, ConfigError>> {
	const contents = await readTextFileIfExists(sourcePath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: null }
	}
	return parseTomlConfig(contents.value, sourcePath, schema, field)
}

function formatZodError(error: z.ZodError, field: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : field
		return `${path}: ${issue.message}`
	})
	return `Invalid ${field}: ${issues.join("; ")}`
}
