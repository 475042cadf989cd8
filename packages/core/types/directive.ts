/**
 * Directive and plan types.
 *
 * A directive is one kind of manifest line. `brew` has no keyword: it is
 * the bucket for every line no other directive claims.
 */

export type ExplicitDirective = "shell" | "apt" | "cargo" | "uv" | "stow"

export type DirectiveName = ExplicitDirective | "brew"

/** A trimmed, comment-free, non-empty manifest line */
export type ManifestLine = string

/** Lines grouped by bucket name, each in manifest order */
export type DirectiveBuckets = Map<string, ManifestLine[]>

export interface PlanEntry {
	directive: DirectiveName
	lines: ManifestLine[]
}

/** Buckets in execution order, after platform exclusions */
export type OrderedPlan = PlanEntry[]

export interface Platform {
	/** Value of `process.platform` */
	os: string
	/** Value of `process.arch` */
	arch: string
}
