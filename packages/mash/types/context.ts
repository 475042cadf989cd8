import type { Platform } from "@mash/core"
import type { ConsolaInstance } from "consola"
import type { MashEnv } from "@/env"
import type { FindExecutable } from "@/exec/lookup"
import type { CommandRunner } from "@/exec/runner"

/** Asks the operator a question; `null` when the prompt was cancelled */
export type Confirm = (message: string) => Promise<string | null>

/** Everything a reconciler may touch, built once per run */
export interface RunContext {
	env: MashEnv
	home: string
	platform: Platform
	logger: ConsolaInstance
	runner: CommandRunner
	findExecutable: FindExecutable
	confirm: Confirm
	/** `--unsafe`: shell directives may run after confirmation */
	unsafe: boolean
}
