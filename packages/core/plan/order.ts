import { ALL_DIRECTIVES } from "../constants"
import type {
	DirectiveBuckets,
	DirectiveName,
	OrderedPlan,
	Platform,
} from "../types/directive"
import type { ConfigurationError, Result } from "../types/error"

const KNOWN_DIRECTIVES: ReadonlySet<string> = new Set(ALL_DIRECTIVES)

export function isDirectiveName(value: string): value is DirectiveName {
	return KNOWN_DIRECTIVES.has(value)
}

export function isMacos(platform: Platform): boolean {
	return platform.os === "darwin"
}

export function isArm(platform: Platform): boolean {
	return platform.arch === "arm64" || platform.arch === "arm"
}

/**
 * Order buckets for execution.
 *
 * macOS drops `apt`. Any bucket name outside the known directives fails the
 * whole plan. Empty buckets are kept.
 */
export function buildPlan(
	buckets: DirectiveBuckets,
	platform: Platform,
): Result<OrderedPlan, ConfigurationError> {
	// ARM needs no exclusions; it only changes the Homebrew prefix.
	const remaining = new Map(buckets)
	if (isMacos(platform)) {
		remaining.delete("apt")
	}

	const unknown = [...remaining.keys()].filter((name) => !isDirectiveName(name))
	if (unknown.length > 0) {
		return {
			error: {
				field: "directives",
				message: `Additional directives not allowed: ${unknown.join(", ")}.`,
				type: "configuration",
				values: unknown,
			},
			ok: false,
		}
	}

	const plan: OrderedPlan = []
	for (const directive of ALL_DIRECTIVES) {
		const lines = remaining.get(directive)
		if (lines !== undefined) {
			plan.push({ directive, lines })
		}
	}

	return { ok: true, value: plan }
}
