/**
 * Custom Vitest assertions for Result types
 *
 * These matchers make it easy to assert on Result<T, E> types
 * that follow the { ok: true, value: T } | { ok: false, error: E } pattern.
 */

import { expect } from "vitest"

interface OkResult<T> {
	ok: true
	value: T
}

interface ErrResult<E> {
	ok: false
	error: E
}

type Result<T, E> = OkResult<T> | ErrResult<E>

function describeError(error: unknown): string {
	return typeof error === "object" && error !== null
		? JSON.stringify(error, null, 2)
		: String(error)
}

expect.extend({
	/**
	 * Assert that a result is an error.
	 *
	 * @example
	 * expect(buildPlan(buckets, linux)).toBeErr()
	 */
	toBeErr(received: Result<unknown, unknown>) {
		if (!received.ok) {
			return {
				message: () =>
					`expected result not to be an error, but got: ${describeError(received.error)}`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected result to be an error, but got ok with value: ${JSON.stringify(received.value)}`,
			pass: false,
		}
	},

	/**
	 * Assert that a result is an error whose `type` matches.
	 *
	 * @example
	 * expect(await resolveManifestPath(options)).toBeErrOfType("configuration")
	 */
	toBeErrOfType(received: Result<unknown, { type?: unknown }>, type: string) {
		if (received.ok) {
			return {
				message: () =>
					`expected result to be a ${type} error, but got ok with value: ${JSON.stringify(received.value)}`,
				pass: false,
			}
		}

		const pass = received.error.type === type
		return {
			message: () =>
				pass
					? `expected error not to be of type ${type}`
					: `expected a ${type} error, but got: ${describeError(received.error)}`,
			pass,
		}
	},

	/**
	 * Assert that a result is Ok.
	 *
	 * @example
	 * expect(loadEnv({})).toBeOk()
	 */
	toBeOk(received: Result<unknown, unknown>) {
		if (received.ok) {
			return {
				message: () =>
					`expected result not to be ok, but got value: ${JSON.stringify(received.value)}`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected result to be ok, but got error:\n${describeError(received.error)}`,
			pass: false,
		}
	},
})

// Extend Vitest's expect types
declare module "vitest" {
	// biome-ignore lint/suspicious/noExplicitAny: matches Vitest's Assertion default.
	interface Assertion<T = any> {
		toBeOk(): void
		toBeErr(): void
		toBeErrOfType(type: string): void
	}
}
