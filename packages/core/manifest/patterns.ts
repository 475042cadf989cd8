/** Matches a whole `<keyword> '<payload>'` or `<keyword> "<payload>"` line */
export function directivePattern(keyword: string): RegExp {
	return new RegExp(`^\\s*${escapeRegExp(keyword)}\\s+['"].*['"]$`)
}

/** Same shape as {@link directivePattern}, capturing the payload */
export function payloadPattern(keyword: string): RegExp {
	return new RegExp(`^\\s*${escapeRegExp(keyword)}\\s+['"](.*)['"]$`)
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}
