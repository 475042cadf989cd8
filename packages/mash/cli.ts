#!/usr/bin/env -S node --import tsx

import { EXIT_CODES } from "@mash/core"
import { Command, Option } from "commander"
import { consola } from "consola"
import { createRunContext } from "@/commands/context"
import { editManifest } from "@/commands/edit"
import { reportSync, syncWithContext } from "@/commands/sync"
import { CommandResult, printOutcome } from "@/commands/types"
import { loadEnv } from "@/env"
import { createLogger } from "@/utils/logger"
import pkg from "./package.json" with { type: "json" }

interface CliOptions {
	dryRun?: boolean
	verbose?: boolean
	quiet?: boolean
	unsafe?: boolean
	edit?: boolean
}

async function run(manifest: string | undefined, options: CliOptions): Promise<void> {
	const logger = createLogger({
		quiet: Boolean(options.quiet),
		verbose: Boolean(options.verbose),
	})

	const env = loadEnv(process.env)
	if (!env.ok) {
		printOutcome(CommandResult.failed(env.error), logger)
		return
	}

	const context = createRunContext(env.value, logger, {
		dryRun: Boolean(options.dryRun),
		quiet: Boolean(options.quiet),
		unsafe: Boolean(options.unsafe),
		verbose: Boolean(options.verbose),
	})
	const target = { cwd: process.cwd(), manifest }

	if (options.edit) {
		const result = await editManifest(target, context)
		if (result.status === "completed") {
			process.exitCode = result.value
			return
		}
		printOutcome(result, logger)
		return
	}

	reportSync(await syncWithContext(target, context), logger)
}

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("mash")
		.description("Bring installed packages in line with a Brewfile-style manifest")
		.version(pkg.version, "-V, --version", "Output the version number")
		.argument("[manifest]", "Manifest to apply (default: $BREWFILE_PATH, $MASHFILE_PATH, ./Brewfile)")
		.option("-n, --dry-run", "Print commands without running them")
		.option("-v, --verbose", "Print command output")
		.addOption(new Option("-q, --quiet", "Only print errors").conflicts("verbose"))
		.option("-u, --unsafe", "Ask before running shell directives")
		.option("-e, --edit", "Open the manifest in $VISUAL or $EDITOR and exit")
		.showHelpAfterError()
		.action(async (manifest: string | undefined, options: CliOptions) => {
			await run(manifest, options)
		})

	process.once("SIGINT", () => {
		consola.warn("Interrupted.")
		process.exit(EXIT_CODES.interrupted)
	})

	await program.parseAsync(process.argv)
}

main().catch((error: unknown) => {
	consola.error(error)
	process.exitCode = EXIT_CODES.genericError
})
