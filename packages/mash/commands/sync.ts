import type { ConsolaInstance } from "consola"
import type { BackendReport } from "@/backends/types"
import { CommandResult, printOutcome } from "@/commands/types"
import { runSync } from "@/sync/sync"
import type { SyncSummary } from "@/sync/types"
import type { RunContext } from "@/types/context"

export async function syncWithContext(
	options: { manifest?: string; cwd: string },
	context: RunContext,
): Promise<CommandResult<SyncSummary>> {
	context.logger.start(context.runner.dryRun ? "Planning sync..." : "Syncing packages...")

	const result = await runSync(options, context)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const ran = result.value.reports.filter((report) => report.status !== "skipped")
	if (ran.length === 0) {
		return CommandResult.unchanged("Nothing to do.")
	}

	return CommandResult.completed(result.value)
}

/** Print the summary and set the process exit code */
export function reportSync(result: CommandResult<SyncSummary>, logger: ConsolaInstance): void {
	if (result.status !== "completed") {
		printOutcome(result, logger)
		return
	}

	const summary = result.value
	for (const report of summary.reports) {
		const line = describeReport(report, summary.dryRun)
		if (line) {
			logger.info(line)
		}
	}

	if (summary.exitCode !== 0) {
		const failures = summary.reports.filter((report) => report.status === "failed")
		logger.error(
			`${failures.length} backend(s) failed: ${failures.map((report) => report.directive).join(", ")}.`,
		)
		process.exitCode = summary.exitCode
		return
	}

	logger.success(summary.dryRun ? "Plan complete." : "Sync complete.")
}

export function describeReport(report: BackendReport, dryRun: boolean): string | null {
	if (report.status === "skipped") {
		return null
	}

	const applyVerb = dryRun ? "would apply" : "applied"
	const removeVerb = dryRun ? "would remove" : "removed"
	const status = report.status === "failed" ? " (failed)" : ""
	return `${report.directive}: ${applyVerb} ${report.applied.length}, ${removeVerb} ${report.removed.length}${status}`
}
