import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import type { IoResult } from "@/io/types"

// Re-export types for convenience
export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return {
			error: {
				message: `Unable to access ${targetPath}.`,
				operation: "stat",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return {
			error: {
				message: `Unable to read ${targetPath}.`,
				operation: "readFile",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return {
			error: {
				message: `Unable to write ${targetPath}.`,
				operation: "writeFile",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

export async function makeTempDir(prefix: string): Promise<IoResult<string>> {
	const base = path.join(tmpdir(), `mash-${prefix}-`)
	try {
		return { ok: true, value: await mkdtemp(base) }
	} catch (error) {
		return {
			error: {
				message: `Unable to create a temporary directory under ${tmpdir()}.`,
				operation: "mkdtemp",
				path: base,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return {
			error: {
				message: `Unable to remove ${targetPath}.`,
				operation: "rm",
				path: toAbsolutePath(targetPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

function toAbsolutePath(value: string): string {
	return path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
}

function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	)
}
