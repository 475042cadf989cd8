import type { ManifestLine } from "../types/directive"
import { payloadPattern } from "./patterns"

export interface ExtractedPayloads {
	payloads: string[]
	/** Lines that did not have the `<keyword> '<payload>'` shape */
	rejected: ManifestLine[]
}

export function extractPayload(keyword: string, line: ManifestLine): string | null {
	const match = payloadPattern(keyword).exec(line)
	const payload = match?.[1]
	return payload ? payload : null
}

export function extractPayloads(
	keyword: string,
	lines: ReadonlyArray<ManifestLine>,
): ExtractedPayloads {
	const payloads: string[] = []
	const rejected: ManifestLine[] = []
	for (const line of lines) {
		const payload = extractPayload(keyword, line)
		if (payload === null) {
			rejected.push(line)
		} else {
			payloads.push(payload)
		}
	}
	return { payloads, rejected }
}
