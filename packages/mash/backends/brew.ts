import path from "node:path"
import {
	EXIT_CODES,
	isArm,
	isMacos,
	type ManifestLine,
	type MashError,
	type Result,
} from "@mash/core"
import { runInstallerScript } from "@/backends/bootstrap"
import { inSequence, type PackageBackend } from "@/backends/lifecycle"
import { runStep } from "@/backends/step"
import type { StageExitCodes } from "@/backends/types"
import { argList } from "@/exec/command"
import { findFirst } from "@/exec/lookup"
import { makeTempDir, removePath, writeTextFile } from "@/io/fs"
import type { RunContext } from "@/types/context"

const HOMEBREW_INSTALLER_URL =
	"https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh"

/** `brew "wget"`, `cask 'firefox'`, `mas "Xcode", id: 497799835` */
const BREWFILE_ENTRY = /^(?:brew|cask|tap|mas|vscode|whalebrew)\s+(["'])[^"']+\1/
/** `wget`, `homebrew/cask/firefox`, `python@3.12` */
const BARE_FORMULA = /^[\w@.+/-]+$/

/** Shown in place of the generated file; a dry run writes nothing */
const DRY_RUN_BREWFILE = "<temporary Brewfile>"

const codes = {
	bootstrap: EXIT_CODES.brewBootstrapFailed,
	cleanup: EXIT_CODES.brewCleanupFailed,
	install: EXIT_CODES.brewInstallFailed,
	uninstall: EXIT_CODES.brewUninstallFailed,
	update: EXIT_CODES.brewUpdateFailed,
} satisfies StageExitCodes

/** The Brewfile line for a default-bucket manifest line, or null */
export function toBrewfileEntry(line: ManifestLine): string | null {
	if (BREWFILE_ENTRY.test(line)) {
		return line
	}
	if (BARE_FORMULA.test(line)) {
		return `brew "${line}"`
	}
	return null
}

export function homebrewPrefixes(context: RunContext): string[] {
	if (context.env.HOMEBREW_PREFIX) {
		return [context.env.HOMEBREW_PREFIX]
	}
	if (isMacos(context.platform)) {
		return [isArm(context.platform) ? "/opt/homebrew" : "/usr/local"]
	}
	return ["/home/linuxbrew/.linuxbrew", path.join(context.home, ".linuxbrew")]
}

function runBundle(brew: string, brewfile: string, context: RunContext) {
	return runStep(
		context,
		{ args: argList("bundle", "--file", brewfile), program: brew },
		{ exitCode: codes.install, stage: "install" },
	)
}

async function bundle(
	brew: string,
	entries: string[],
	context: RunContext,
): Promise<Result<unknown, MashError>> {
	if (context.runner.dryRun) {
		context.logger.info(`[dry-run] Brewfile entries: ${entries.join(", ")}`)
		return runBundle(brew, DRY_RUN_BREWFILE, context)
	}

	const tempDir = await makeTempDir("brew")
	if (!tempDir.ok) {
		return tempDir
	}

	const brewfile = path.join(tempDir.value, "Brewfile")
	const written = await writeTextFile(brewfile, `${entries.join("\n")}\n`)
	const result = written.ok ? await runBundle(brew, brewfile, context) : written

	const removed = await removePath(tempDir.value)
	if (!removed.ok) {
		context.logger.warn(removed.error.message)
	}
	return result
}

export const brewBackend: PackageBackend<string> = {
	bootstrap: (context) =>
		runInstallerScript(
			{
				curlArgs: ["-fsSL"],
				directive: "brew",
				displayName: "Homebrew",
				env: { NONINTERACTIVE: "1" },
				exitCode: codes.bootstrap,
				interpreter: "/bin/bash",
				requires: ["git"],
				url: HOMEBREW_INSTALLER_URL,
			},
			context,
		),

	cleanup: (brew, context) => runStep(context, { args: argList("cleanup"), program: brew }),

	desired: (lines) => {
		const packages: string[] = []
		const rejected: ManifestLine[] = []
		for (const line of lines) {
			const entry = toBrewfileEntry(line)
			if (entry === null) {
				rejected.push(line)
			} else {
				packages.push(entry)
			}
		}
		return { packages, rejected }
	},

	directive: "brew",

	displayName: "Homebrew",

	install: (brew, entries, context) => bundle(brew, entries, context),

	locate: (context) =>
		findFirst(
			["brew", ...homebrewPrefixes(context).map((prefix) => path.join(prefix, "bin", "brew"))],
			context.findExecutable,
		),

	update: (brew, context) =>
		inSequence([
			() => runStep(context, { args: argList("update"), program: brew }),
			() => runStep(context, { args: argList("upgrade"), program: brew }),
		]),
}
