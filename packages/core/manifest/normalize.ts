import type { ManifestLine } from "../types/directive"

const LINE_BREAKS = /[\r\n]/g
// Naive: a `#` inside a quoted payload also starts a comment.
const COMMENT = /\s*#.*$/

/**
 * Strip line breaks, comments and surrounding whitespace, then drop lines
 * left empty. Order is preserved.
 */
export function normalizeLines(lines: Iterable<string>): ManifestLine[] {
	const normalized: ManifestLine[] = []
	for (const raw of lines) {
		const line = raw.replace(LINE_BREAKS, "").replace(COMMENT, "").trim()
		if (line) {
			normalized.push(line)
		}
	}

	return normalized
}

export function splitManifest(contents: string): ManifestLine[] {
	return normalizeLines(contents.split("\n"))
}
