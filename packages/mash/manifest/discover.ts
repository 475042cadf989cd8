import path from "node:path"
import {
	type ConfigurationError,
	DEFAULT_MANIFEST_FILENAME,
	MANIFEST_PATH_VARS,
	type Result,
} from "@mash/core"
import type { MashEnv } from "@/env"
import { safeStat } from "@/io/fs"
import type { IoError } from "@/io/types"
import { expandHome } from "@/utils/text"

export type ManifestSource = "argument" | (typeof MANIFEST_PATH_VARS)[number] | "default"

export interface ManifestLocation {
	path: string
	source: ManifestSource
}

export interface DiscoverOptions {
	/** Path given on the command line, if any */
	explicitPath?: string
	env: MashEnv
	cwd: string
	home: string
}

function locate(raw: string, source: ManifestSource, options: DiscoverOptions): ManifestLocation {
	return { path: path.resolve(options.cwd, expandHome(raw, options.home)), source }
}

/**
 * The highest-priority source that was supplied: the argument, then
 * `$BREWFILE_PATH`, then `$MASHFILE_PATH`, then `./Brewfile`.
 */
export function selectManifest(options: DiscoverOptions): ManifestLocation {
	const explicit = options.explicitPath?.trim()
	if (explicit) {
		return locate(explicit, "argument", options)
	}
	for (const name of MANIFEST_PATH_VARS) {
		const value = options.env[name]
		if (value) {
			return locate(value, name, options)
		}
	}
	return locate(DEFAULT_MANIFEST_FILENAME, "default", options)
}

/** A selected manifest that is missing is an error; lower sources never stand in for it. */
export async function resolveManifestPath(
	options: DiscoverOptions,
): Promise<Result<ManifestLocation, ConfigurationError | IoError>> {
	const selected = selectManifest(options)
	const stats = await safeStat(selected.path)
	if (!stats.ok) {
		return stats
	}
	if (stats.value?.isFile()) {
		return { ok: true, value: selected }
	}

	const problem = stats.value ? "is not a regular file" : "does not exist"
	return {
		error: {
			field: "manifest",
			message: `Manifest ${selected.path} (${selected.source}) ${problem}.`,
			type: "configuration",
			values: [selected.path],
		},
		ok: false,
	}
}
