import type { AbsolutePath, BaseError } from "@gitfleet/core"
import type { ZodError } from "zod"

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: AbsolutePath
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: AbsolutePath
	  })

export interface ParseError extends BaseError {
	type: "parse"
	source: string
	path?: AbsolutePath
}

export interface IoError extends BaseError {
	type: "io"
	path: AbsolutePath
	operation: string
}

export interface ConflictError extends BaseError {
	type: "conflict"
	target: string
	path?: AbsolutePath
}

export interface NotFoundError extends BaseError {
	type: "not_found"
	target: string
	path?: AbsolutePath
}

export interface SpawnError extends BaseError {
	type: "spawn"
	command: string
	path: AbsolutePath
}

/** git ran but its answer could not be read (output over the limit, killed). */
export interface GitQueryError extends BaseError {
	type: "git"
	command: string
	path: AbsolutePath
}

export type FleetError =
	| ValidationError
	| ParseError
	| IoError
	| ConflictError
	| NotFoundError
	| SpawnError
	| GitQueryError
