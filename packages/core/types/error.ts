export interface BaseError {
	type: string
	message: string
	rawError?: Error
}

export type Result<T, E extends BaseError = BaseError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
