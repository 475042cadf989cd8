import { DEFAULT_DIRECTIVE, EXPLICIT_DIRECTIVES } from "../constants"
import type { DirectiveBuckets, ManifestLine } from "../types/directive"
import { splitManifest } from "./normalize"
import { directivePattern } from "./patterns"

/**
 * Progressive filter: each keyword claims its matches from whatever the
 * previous keywords left behind. The remainder becomes the default bucket.
 */
export function classifyLines(
	lines: ReadonlyArray<ManifestLine>,
	keywords: ReadonlyArray<string>,
	defaultBucket: string = DEFAULT_DIRECTIVE,
): DirectiveBuckets {
	const buckets: DirectiveBuckets = new Map()
	let remaining = [...lines]

	for (const keyword of keywords) {
		const pattern = directivePattern(keyword)
		const [matched, unmatched] = partition(remaining, (line) => pattern.test(line))
		buckets.set(keyword, matched)
		remaining = unmatched
	}

	buckets.set(defaultBucket, [...(buckets.get(defaultBucket) ?? []), ...remaining])
	return buckets
}

export function readManifest(contents: string): DirectiveBuckets {
	return classifyLines(splitManifest(contents), EXPLICIT_DIRECTIVES)
}

function partition<T>(items: T[], predicate: (item: T) => boolean): [T[], T[]] {
	const matched: T[] = []
	const unmatched: T[] = []
	for (const item of items) {
		if (predicate(item)) {
			matched.push(item)
		} else {
			unmatched.push(item)
		}
	}
	return [matched, unmatched]
}
