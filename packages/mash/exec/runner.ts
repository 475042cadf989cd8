import type { BackendStage, ExecutionError, Result } from "@mash/core"
import type { ConsolaInstance } from "consola"
import { formatCommand, type ResolvedCommand } from "@/exec/command"
import type { Spawner } from "@/exec/spawn"

export interface RunnerOptions {
	dryRun: boolean
	verbose: boolean
	quiet: boolean
	logger: ConsolaInstance
	spawner: Spawner
}

/** Marks a step as critical: a non-zero exit becomes an error for `stage` */
export interface FailurePolicy {
	stage: BackendStage
	/** Exit code the run reports if this step fails */
	exitCode: number
}

export interface ExecutionOutput {
	exitCode: number
	stdout: string
	stderr: string
	dryRun: boolean
}

export type ExecutionResult = Result<ExecutionOutput, ExecutionError>

export interface CommandRunner {
	readonly dryRun: boolean
	/** Critical when `fatal` is given, best-effort otherwise */
	run(command: ResolvedCommand, fatal?: FailurePolicy): Promise<ExecutionResult>
	/** Read-only query returning stdout; `null` in dry-run, where nothing is spawned */
	query(
		command: ResolvedCommand,
		fatal: FailurePolicy,
	): Promise<Result<string | null, ExecutionError>>
}

const DRY_RUN_OUTPUT: ExecutionOutput = { dryRun: true, exitCode: 0, stderr: "", stdout: "" }

export function createCommandRunner(options: RunnerOptions): CommandRunner {
	const { logger, spawner } = options

	async function spawnAndLog(command: ResolvedCommand) {
		const outcome = await spawner({
			argv: command.argv,
			env: command.env,
			output: command.output,
		})
		const stdout = outcome.stdout.trim()
		const stderr = outcome.stderr.trim()
		if (options.verbose) {
			if (stdout) logger.debug(stdout)
			if (stderr) logger.debug(stderr)
		}
		return { exitCode: outcome.exitCode, stderr, stdout }
	}

	function failure(
		text: string,
		exitCode: number,
		stderr: string,
		fatal: FailurePolicy,
	): ExecutionError {
		return {
			command: text,
			exitCode,
			message: `${text} failed with exit code ${exitCode}`,
			runExitCode: fatal.exitCode,
			stage: fatal.stage,
			stderr,
			type: "execution",
		}
	}

	return {
		dryRun: options.dryRun,

		async run(command, fatal) {
			const text = formatCommand(command)
			if (options.dryRun) {
				logger.info(`[dry-run] ${text}`)
				return { ok: true, value: DRY_RUN_OUTPUT }
			}

			if (!options.quiet) {
				logger.info(text)
			}

			const { exitCode, stderr, stdout } = await spawnAndLog(command)
			if (exitCode !== 0) {
				if (fatal) {
					if (stderr) logger.error(stderr)
					return { error: failure(text, exitCode, stderr, fatal), ok: false }
				}

				logger.warn(`${text} failed with exit code ${exitCode}`)
				if (stderr) logger.warn(stderr)
			} else if (!options.quiet) {
				logger.success(`${text} completed successfully`)
			}

			return { ok: true, value: { dryRun: false, exitCode, stderr, stdout } }
		},

		async query(command, fatal) {
			const text = formatCommand(command)
			if (options.dryRun) {
				logger.info(`[dry-run] ${text}`)
				return { ok: true, value: null }
			}

			logger.debug(text)
			const { exitCode, stderr, stdout } = await spawnAndLog({
				...command,
				output: "capture",
			})
			if (exitCode !== 0) {
				if (stderr) logger.error(stderr)
				return { error: failure(text, exitCode, stderr, fatal), ok: false }
			}

			return { ok: true, value: stdout }
		},
	}
}
