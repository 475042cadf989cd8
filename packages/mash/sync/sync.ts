import { buildPlan, EXIT_CODES, readManifest } from "@mash/core"
import { reconcilerFor } from "@/backends/registry"
import type { BackendReport } from "@/backends/types"
import { readTextFile } from "@/io/fs"
import { resolveManifestPath } from "@/manifest/discover"
import { exitCodeFor, failSync } from "@/sync/errors"
import type { SyncOptions, SyncResult, SyncSummary } from "@/sync/types"
import type { RunContext } from "@/types/context"

const BACKEND_LABELS = {
	apt: "apt",
	brew: "Homebrew",
	cargo: "cargo",
	shell: "shell",
	stow: "stow",
	uv: "uv",
} as const

export async function runSync(
	options: SyncOptions,
	context: RunContext,
): Promise<SyncResult<SyncSummary>> {
	const location = await resolveManifestPath({
		cwd: options.cwd,
		env: context.env,
		explicitPath: options.manifest,
		home: context.home,
	})
	if (!location.ok) {
		return failSync("discover", location.error)
	}
	context.logger.debug(`Using manifest ${location.value.path} (${location.value.source}).`)

	const contents = await readTextFile(location.value.path)
	if (!contents.ok) {
		return failSync("read", contents.error)
	}

	const plan = buildPlan(readManifest(contents.value), context.platform)
	if (!plan.ok) {
		return failSync("plan", plan.error)
	}

	const reports: BackendReport[] = []
	let exitCode: number = EXIT_CODES.ok

	// Strictly sequential: later buckets may depend on tools earlier ones set up.
	for (const entry of plan.value) {
		if (entry.lines.length > 0) {
			context.logger.start(`Running ${BACKEND_LABELS[entry.directive]}-based commands`)
		}

		const report = await reconcilerFor(entry.directive).reconcile(entry.lines, context)
		reports.push(report)

		if (report.status === "failed" && report.error) {
			logBackendFailure(report, context)
			if (exitCode === EXIT_CODES.ok) {
				exitCode = exitCodeFor(report.error)
			}
		}
	}

	return {
		ok: true,
		value: {
			dryRun: context.runner.dryRun,
			exitCode,
			manifestPath: location.value.path,
			plan: plan.value,
			reports,
		},
	}
}

function logBackendFailure(report: BackendReport, context: RunContext): void {
	const { error } = report
	if (!error) return

	if (error.type === "tool_missing") {
		context.logger.warn(error.message)
		return
	}
	context.logger.error(`${report.directive}: ${error.message}`)
}
