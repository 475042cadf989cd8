import path from "node:path"
import type { DirectiveName, MashError, Result } from "@mash/core"
import { toolMissing } from "@/backends/lifecycle"
import { runStep } from "@/backends/step"
import { argList } from "@/exec/command"
import { findFirst } from "@/exec/lookup"
import { makeTempDir, removePath } from "@/io/fs"
import type { RunContext } from "@/types/context"

/** Shown in place of the download path; a dry run creates no files */
const DRY_RUN_SCRIPT = "<temporary install.sh>"

export interface InstallerScript {
	directive: DirectiveName
	displayName: string
	url: string
	/** Flags for curl, before `-o <file> <url>` */
	curlArgs: string[]
	/** Interpreter that runs the downloaded script */
	interpreter: string
	scriptArgs?: string[]
	env?: Record<string, string>
	/** Executables the installer itself needs besides curl */
	requires?: string[]
	exitCode: number
}

/**
 * Download an upstream installer with curl and run it. The download and the
 * run are two explicit commands; nothing is piped through a shell.
 */
export async function runInstallerScript(
	script: InstallerScript,
	context: RunContext,
): Promise<Result<void, MashError>> {
	for (const helper of ["curl", ...(script.requires ?? [])]) {
		const found = await findFirst([helper], context.findExecutable)
		if (!found) {
			return {
				error: toolMissing(
					script.directive,
					helper,
					`${script.displayName} is not present and it requires ${helper} to install.`,
				),
				ok: false,
			}
		}
	}

	if (context.runner.dryRun) {
		return downloadAndRun(script, DRY_RUN_SCRIPT, context)
	}

	const tempDir = await makeTempDir(script.directive)
	if (!tempDir.ok) {
		return tempDir
	}

	const result = await downloadAndRun(script, path.join(tempDir.value, "install.sh"), context)

	const removed = await removePath(tempDir.value)
	if (!removed.ok) {
		context.logger.warn(removed.error.message)
	}
	return result
}

async function downloadAndRun(
	script: InstallerScript,
	scriptPath: string,
	context: RunContext,
): Promise<Result<void, MashError>> {
	const fatal = { exitCode: script.exitCode, stage: "bootstrap" as const }
	const downloaded = await runStep(
		context,
		{ args: argList(...script.curlArgs, "-o", scriptPath, script.url), program: "curl" },
		fatal,
	)
	const result = downloaded.ok
		? await runStep(
				context,
				{
					args: argList(scriptPath, ...(script.scriptArgs ?? [])),
					env: script.env,
					program: script.interpreter,
				},
				fatal,
			)
		: downloaded

	return result.ok ? { ok: true, value: undefined } : result
}
