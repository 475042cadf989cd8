import {
	computeRemovals,
	type DirectiveName,
	type IdentifyPackage,
	type ManifestLine,
	type MashError,
	type Result,
} from "@mash/core"
import type { BackendReport } from "@/backends/types"
import { failed, skipped } from "@/backends/types"
import type { RunContext } from "@/types/context"

type Step = Promise<Result<unknown, MashError>>

export interface DesiredPackages {
	packages: string[]
	/** Lines that could not be turned into a package */
	rejected: ManifestLine[]
}

export interface DriftSupport<Tool> {
	/** Installed identifiers; `null` when nothing could be queried (dry-run) */
	list(tool: Tool, context: RunContext): Promise<Result<string[] | null, MashError>>
	remove(tool: Tool, packages: string[], context: RunContext): Step
	identify: IdentifyPackage
}

/**
 * A package manager driven through bootstrap, update, install, drift removal
 * and cleanup. `Tool` is whatever `locate` resolves, e.g. an executable path.
 */
export interface PackageBackend<Tool> {
	directive: DirectiveName
	displayName: string
	desired(lines: ManifestLine[]): DesiredPackages
	locate(context: RunContext): Promise<Tool | null>
	bootstrap?(context: RunContext): Step
	update?(tool: Tool, context: RunContext): Step
	install(tool: Tool, packages: string[], context: RunContext): Step
	drift?: DriftSupport<Tool>
	cleanup?(tool: Tool, context: RunContext): Step
}

export async function runPackageBackend<Tool>(
	backend: PackageBackend<Tool>,
	lines: ManifestLine[],
	context: RunContext,
): Promise<BackendReport> {
	const { directive, displayName } = backend
	const { logger } = context

	if (lines.length === 0) {
		return skipped(directive)
	}

	const { packages, rejected } = backend.desired(lines)
	for (const line of rejected) {
		logger.warn(`Unrecognized ${directive} directive: ${line}`)
	}
	if (packages.length === 0) {
		logger.info(`No ${displayName} packages to install.`)
		return skipped(directive)
	}

	let tool = await backend.locate(context)
	if (tool) {
		logger.info(`${displayName} already installed, skipping bootstrap.`)
	} else {
		if (!backend.bootstrap) {
			return failed(directive, toolMissing(directive, displayName))
		}

		logger.info(`Installing ${displayName}...`)
		const bootstrapped = await backend.bootstrap(context)
		if (!bootstrapped.ok) {
			return failed(directive, bootstrapped.error)
		}

		tool = await backend.locate(context)
		if (!tool) {
			if (context.runner.dryRun) {
				logger.info(`[dry-run] ${displayName} is not installed yet, skipping the rest.`)
				return skipped(directive)
			}
			return failed(
				directive,
				toolMissing(
					directive,
					displayName,
					`${displayName} not found after attempted installation.`,
				),
			)
		}
	}

	if (backend.update) {
		const updated = await backend.update(tool, context)
		if (!updated.ok) {
			return failed(directive, updated.error)
		}
	}

	const installed = await backend.install(tool, packages, context)
	if (!installed.ok) {
		return failed(directive, installed.error)
	}

	let removed: string[] = []
	if (backend.drift) {
		const listed = await backend.drift.list(tool, context)
		if (!listed.ok) {
			return failed(directive, listed.error, { applied: packages })
		}

		if (listed.value === null) {
			logger.info(`[dry-run] Skipping ${displayName} drift check.`)
		} else {
			const removals = computeRemovals(listed.value, packages, backend.drift.identify)
			if (removals.length > 0) {
				logger.info(`Removing ${displayName} packages no longer listed in the manifest:`)
				for (const name of removals) {
					logger.info(`  ${name}`)
				}

				const uninstalled = await backend.drift.remove(tool, removals, context)
				if (!uninstalled.ok) {
					return failed(directive, uninstalled.error, { applied: packages })
				}
				removed = removals
			}
		}
	}

	if (backend.cleanup) {
		const cleaned = await backend.cleanup(tool, context)
		if (!cleaned.ok) {
			return failed(directive, cleaned.error, { applied: packages, removed })
		}
	}

	return { applied: packages, directive, removed, status: "completed" }
}

/** Run steps in order, stopping at the first failure */
export async function inSequence(steps: Array<() => Step>): Step {
	for (const step of steps) {
		const result = await step()
		if (!result.ok) {
			return result
		}
	}
	return { ok: true, value: undefined }
}

export function toolMissing(
	directive: DirectiveName,
	target: string,
	message = `${target} is not installed.`,
): MashError {
	return { directive, message, target, type: "tool_missing" }
}
