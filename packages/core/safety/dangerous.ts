/**
 * Commands refused at construction time.
 *
 * A small heuristic against accidental self-harm from a manifest typo, not a
 * security boundary: `rm -r -f` or `find -delete` pass.
 */
export const DANGEROUS_SHELL_PATTERNS: ReadonlyArray<RegExp> = [
	/\brm\s+-rf\b/,
	/\bmkfs\b/,
	/\bshutdown\b/,
]

/** The first pattern the argv matches, or null */
export function findDangerousPattern(argv: ReadonlyArray<string>): RegExp | null {
	const joined = argv.join(" ")
	for (const pattern of DANGEROUS_SHELL_PATTERNS) {
		if (pattern.test(joined)) {
			return pattern
		}
	}
	return null
}
