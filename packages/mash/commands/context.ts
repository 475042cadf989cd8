import { homedir } from "node:os"
import type { Platform } from "@mash/core"
import type { ConsolaInstance } from "consola"
import { promptConfirm } from "@/commands/prompt"
import type { MashEnv } from "@/env"
import { createPathLookup, type FindExecutable } from "@/exec/lookup"
import { createCommandRunner } from "@/exec/runner"
import { createProcessSpawner, type Spawner } from "@/exec/spawn"
import type { Confirm, RunContext } from "@/types/context"

export interface RunFlags {
	dryRun: boolean
	verbose: boolean
	quiet: boolean
	unsafe: boolean
}

export interface ContextOverrides {
	platform?: Platform
	spawner?: Spawner
	findExecutable?: FindExecutable
	confirm?: Confirm
}

export function createRunContext(
	env: MashEnv,
	logger: ConsolaInstance,
	flags: RunFlags,
	overrides: ContextOverrides = {},
): RunContext {
	const spawner = overrides.spawner ?? createProcessSpawner(process.env)
	return {
		confirm: overrides.confirm ?? promptConfirm,
		env,
		findExecutable: overrides.findExecutable ?? createPathLookup(env.PATH),
		home: env.HOME ?? homedir(),
		logger,
		platform: overrides.platform ?? { arch: process.arch, os: process.platform },
		runner: createCommandRunner({
			dryRun: flags.dryRun,
			logger,
			quiet: flags.quiet,
			spawner,
			verbose: flags.verbose,
		}),
		unsafe: flags.unsafe,
	}
}
