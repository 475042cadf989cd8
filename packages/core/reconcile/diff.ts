export type IdentifyPackage = (value: string) => string

/**
 * Entries of `installed` whose identity is absent from `desired`, sorted.
 * Returns the installed spelling so it can be passed to an uninstall.
 */
export function computeRemovals(
	installed: Iterable<string>,
	desired: Iterable<string>,
	identify: IdentifyPackage = (value) => value,
): string[] {
	const wanted = new Set<string>()
	for (const value of desired) {
		wanted.add(identify(value))
	}

	const removals = new Set<string>()
	for (const value of installed) {
		if (!wanted.has(identify(value))) {
			removals.add(value)
		}
	}

	return [...removals].sort()
}
