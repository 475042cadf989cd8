import type { MashError, Result } from "@mash/core"
import { buildCommand, type CommandSpec } from "@/exec/command"
import type { ExecutionOutput, FailurePolicy } from "@/exec/runner"
import type { RunContext } from "@/types/context"

export type StepResult = Result<ExecutionOutput | null, MashError>

/**
 * Build and run one command. Critical steps (with `fatal`) fail on a missing
 * executable or a refused command; best-effort steps warn and move on.
 */
export async function runStep(
	context: RunContext,
	spec: CommandSpec,
	fatal?: FailurePolicy,
): Promise<StepResult> {
	const built = await buildCommand(spec, context.findExecutable)
	if (!built.ok) {
		if (fatal) {
			return built
		}
		context.logger.warn(built.error.message)
		return { ok: true, value: null }
	}

	return context.runner.run(built.value, fatal)
}

/** Build and run a read-only query; `null` in dry-run */
export async function runQuery(
	context: RunContext,
	spec: CommandSpec,
	fatal: FailurePolicy,
): Promise<Result<string | null, MashError>> {
	const built = await buildCommand(spec, context.findExecutable)
	if (!built.ok) {
		return built
	}

	return context.runner.query(built.value, fatal)
}
