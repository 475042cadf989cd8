import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { loadEnv, type MashEnv } from "@/env"
import { resolveManifestPath, selectManifest } from "@/manifest/discover"
import { withTempDir } from "@/tests/helpers"
import "@/tests/helpers/assertions"

function env(source: Record<string, string> = {}): MashEnv {
	const result = loadEnv(source)
	if (!result.ok) throw new Error(result.error.message)
	return result.value
}

describe("selectManifest", () => {
	const sources = { BREWFILE_PATH: "~/Brewfile", MASHFILE_PATH: "conf/Mashfile" }

	it("prefers the argument", () => {
		expect(
			selectManifest({
				cwd: "/work",
				env: env(sources),
				explicitPath: "other/Brewfile",
				home: "/home/tester",
			}),
		).toEqual({ path: "/work/other/Brewfile", source: "argument" })
	})

	it("falls to $BREWFILE_PATH and expands ~", () => {
		expect(selectManifest({ cwd: "/work", env: env(sources), home: "/home/tester" })).toEqual({
			path: "/home/tester/Brewfile",
			source: "BREWFILE_PATH",
		})
	})

	it("uses $MASHFILE_PATH when $BREWFILE_PATH is unset", () => {
		expect(
			selectManifest({
				cwd: "/work",
				env: env({ MASHFILE_PATH: "conf/Mashfile" }),
				home: "/home/tester",
			}),
		).toEqual({ path: "/work/conf/Mashfile", source: "MASHFILE_PATH" })
	})

	it("ignores a blank argument", () => {
		expect(
			selectManifest({ cwd: "/work", env: env(), explicitPath: "  ", home: "/home/tester" }),
		).toEqual({ path: "/work/Brewfile", source: "default" })
	})
})

describe("resolveManifestPath", () => {
	it("returns the selected manifest when it is a file", async () => {
		await withTempDir(async (dir) => {
			await writeFile(join(dir, "Mashfile"), "vim\n")

			const result = await resolveManifestPath({
				cwd: dir,
				env: env({ MASHFILE_PATH: "Mashfile" }),
				home: dir,
			})

			expect(result).toEqual({
				ok: true,
				value: { path: join(dir, "Mashfile"), source: "MASHFILE_PATH" },
			})
		})
	})

	it("fails on a missing argument even when ./Brewfile exists", async () => {
		await withTempDir(async (dir) => {
			await writeFile(join(dir, "Brewfile"), 'apt "curl"\n')

			const result = await resolveManifestPath({
				cwd: dir,
				env: env(),
				explicitPath: "typo.Brewfile",
				home: dir,
			})

			expect(result).toEqual({
				error: {
					field: "manifest",
					message: `Manifest ${join(dir, "typo.Brewfile")} (argument) does not exist.`,
					type: "configuration",
					values: [join(dir, "typo.Brewfile")],
				},
				ok: false,
			})
		})
	})

	it("fails on a missing $BREWFILE_PATH without trying $MASHFILE_PATH", async () => {
		await withTempDir(async (dir) => {
			await writeFile(join(dir, "Mashfile"), "vim\n")

			const result = await resolveManifestPath({
				cwd: dir,
				env: env({ BREWFILE_PATH: join(dir, "absent"), MASHFILE_PATH: "Mashfile" }),
				home: dir,
			})

			expect(result).toEqual({
				error: {
					field: "manifest",
					message: `Manifest ${join(dir, "absent")} (BREWFILE_PATH) does not exist.`,
					type: "configuration",
					values: [join(dir, "absent")],
				},
				ok: false,
			})
		})
	})

	it("rejects a directory", async () => {
		await withTempDir(async (dir) => {
			await mkdir(join(dir, "Brewfile"))

			const result = await resolveManifestPath({ cwd: dir, env: env(), home: dir })

			expect(result).toBeErrOfType("configuration")
			if (!result.ok) {
				expect(result.error.message).toBe(
					`Manifest ${join(dir, "Brewfile")} (default) is not a regular file.`,
				)
			}
		})
	})
})
