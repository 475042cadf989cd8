import { constants } from "node:fs"
import { access, stat } from "node:fs/promises"
import path from "node:path"

export type ExecutableLookup =
	| { found: true; path: string }
	| { found: false; name: string }

export type FindExecutable = (name: string) => Promise<ExecutableLookup>

/**
 * Look executables up the way a shell would: names containing a slash are
 * checked directly, bare names are searched along `searchPath`.
 */
export function createPathLookup(searchPath: string): FindExecutable {
	const directories = searchPath.split(path.delimiter).filter(Boolean)

	return async (name) => {
		if (name.includes("/")) {
			return (await isExecutableFile(name))
				? { found: true, path: name }
				: { found: false, name }
		}

		for (const directory of directories) {
			const candidate = path.join(directory, name)
			if (await isExecutableFile(candidate)) {
				return { found: true, path: candidate }
			}
		}

		return { found: false, name }
	}
}

/** The first candidate found, in order */
export async function findFirst(
	candidates: ReadonlyArray<string>,
	findExecutable: FindExecutable,
): Promise<string | null> {
	for (const candidate of candidates) {
		const lookup = await findExecutable(candidate)
		if (lookup.found) {
			return lookup.path
		}
	}
	return null
}

async function isExecutableFile(filePath: string): Promise<boolean> {
	const stats = await stat(filePath).catch(() => null)
	if (!stats?.isFile()) {
		return false
	}

	return access(filePath, constants.X_OK).then(
		() => true,
		() => false,
	)
}
