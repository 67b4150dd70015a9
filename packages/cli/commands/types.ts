import { consola } from "consola"
import type { FleetError } from "@/types/errors"

// CommandResult models user-facing flow outcomes; core operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "failed"; error: FleetError }

export const CommandResult = {
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: FleetError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

/**
 * Commands print their own success output; this reports everything else.
 */
export function printOutcome(result: CommandResult<unknown>): void {
	switch (result.status) {
		case "completed":
			break
		case "unchanged":
			consola.info(result.reason)
			break
		case "failed":
			consola.error(formatError(result.error))
			process.exitCode = 1
			break
	}
}

/**
 * One line for the error, plus the underlying error's message on a second line
 * when it adds something.
 */
export function formatError(error: FleetError): string {
	const where = errorLocation(error)
	const headline = where ? `${error.message} (${where})` : error.message
	const underlying = error.rawError?.message
	if (!underlying || error.message.includes(underlying)) {
		return headline
	}
	return `${headline}\n  ${underlying}`
}

function errorLocation(error: FleetError): string | undefined {
	switch (error.type) {
		case "validation":
			return error.path ? `${error.field} in ${error.path}` : undefined
		case "parse":
			return error.path
		case "io":
			return error.operation
		case "conflict":
		case "not_found":
		case "spawn":
		case "git":
			return undefined
	}
}
