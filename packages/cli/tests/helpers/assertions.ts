/**
 * Vitest matchers for `{ ok: true, value } | { ok: false, error }` results.
 */

import { expect } from "vitest"

type Outcome = { ok: true; value: unknown } | { ok: false; error: unknown }

function describeValue(value: unknown): string {
	return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value)
}

expect.extend({
	toBeErr(received: Outcome) {
		if (!received.ok) {
			return {
				message: () =>
					`expected result not to be an error, but got: ${describeValue(received.error)}`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected result to be an error, but got ok with value: ${describeValue(received.value)}`,
			pass: false,
		}
	},

	/**
	 * @example
	 * expect(await registry.rename("api", "a,b")).toBeErrContaining("not a valid repo name")
	 */
	toBeErrContaining(received: Outcome, substring: string) {
		if (received.ok) {
			return {
				message: () =>
					`expected result to be an error, but got ok with value: ${describeValue(received.value)}`,
				pass: false,
			}
		}

		const errorString = describeValue(received.error)
		if (errorString.includes(substring)) {
			return {
				message: () => `expected error not to contain "${substring}", but it did`,
				pass: true,
			}
		}

		return {
			message: () => `expected error to contain "${substring}", but got: ${errorString}`,
			pass: false,
		}
	},

	toBeOk(received: Outcome) {
		if (received.ok) {
			return {
				message: () =>
					`expected result not to be ok, but got value: ${describeValue(received.value)}`,
				pass: true,
			}
		}

		return {
			message: () => `expected result to be ok, but got error:\n${describeValue(received.error)}`,
			pass: false,
		}
	},
})

declare module "vitest" {
	// biome-ignore lint/suspicious/noExplicitAny: matches Vitest's Assertion default.
	interface Assertion<T = any> {
		toBeOk(): void
		toBeErr(): void
		toBeErrContaining(substring: string): void
	}

	interface AsymmetricMatchersContaining {
		toBeOk(): void
		toBeErr(): void
	}
}
