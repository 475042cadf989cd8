import { EXIT_CODES, extractPayloads, type MashError } from "@mash/core"
import { runStep } from "@/backends/step"
import { type BackendReport, failed, type Reconciler, skipped } from "@/backends/types"
import { shellOverrideEnabled } from "@/env"
import { argList } from "@/exec/command"
import type { RunContext } from "@/types/context"

const SHELL = "/bin/sh"

export type ShellGateDecision = "override" | "confirmed" | "declined" | "locked"

/**
 * Shell directives run only when an override variable is set, or when
 * `--unsafe` was passed and the operator answers `y`.
 */
export async function decideShellGate(
	commands: string[],
	context: RunContext,
): Promise<ShellGateDecision> {
	const listing = `\n\t${commands.join("\n\t")}`
	if (shellOverrideEnabled(context.env)) {
		context.logger.info(`Running commands:${listing}`)
		return "override"
	}

	if (context.unsafe) {
		const answer = await context.confirm(
			`Are you certain you wish to run commands:${listing}\n[y]es/[n]o`,
		)
		if (answer?.trim().toLowerCase() === "y") {
			return "confirmed"
		}
		context.logger.warn("Aborted by user.")
		return "declined"
	}

	context.logger.warn(
		`Did not run commands:${listing}\n\nTo run these commands, use the -u/--unsafe flag.`,
	)
	return "locked"
}

export const shellReconciler: Reconciler = {
	directive: "shell",

	async reconcile(lines, context): Promise<BackendReport> {
		if (lines.length === 0) {
			return skipped("shell")
		}

		const { payloads, rejected } = extractPayloads("shell", lines)
		for (const line of rejected) {
			context.logger.warn(`Unrecognized shell directive: ${line}`)
		}
		if (payloads.length === 0) {
			context.logger.info("No shell commands to run.")
			return skipped("shell")
		}

		const decision = await decideShellGate(payloads, context)
		if (decision === "declined" || decision === "locked") {
			context.logger.info(`Ran 0 of ${payloads.length} shell command(s).`)
			return skipped("shell")
		}

		const applied: string[] = []
		let refused: MashError | undefined
		for (const payload of payloads) {
			const result = await runStep(
				context,
				{ args: argList("-c", payload), program: SHELL },
				{ exitCode: EXIT_CODES.managerExecFailed, stage: "install" },
			)
			if (!result.ok) {
				if (result.error.type === "command_refused") {
					context.logger.error(result.error.message)
					refused = refused ?? result.error
					continue
				}
				return failed("shell", result.error, { applied })
			}
			applied.push(payload)
		}

		if (refused) {
			return failed("shell", refused, { applied })
		}
		return { applied, directive: "shell", removed: [], status: "completed" }
	},
}
