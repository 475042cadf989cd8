import path from "node:path"
import { EXIT_CODES, extractPayloads, type ManifestLine } from "@mash/core"
import { toolMissing } from "@/backends/lifecycle"
import { runStep } from "@/backends/step"
import { type BackendReport, failed, type Reconciler, skipped } from "@/backends/types"
import { lazyArgs } from "@/exec/command"
import { findFirst } from "@/exec/lookup"
import { safeStat } from "@/io/fs"
import type { RunContext } from "@/types/context"
import { expandHome } from "@/utils/text"

/** A stow package: `dir/name` is stowed from `dir` into home */
export interface StowTarget {
	dir: string
	name: string
}

export function resolveStowTarget(payload: string, home: string): StowTarget {
	const expanded = expandHome(payload, home)
	const absolute = path.isAbsolute(expanded) ? expanded : path.join(home, expanded)
	return { dir: path.dirname(absolute), name: path.basename(absolute) }
}

async function existingTargets(
	lines: ManifestLine[],
	context: RunContext,
): Promise<StowTarget[]> {
	const { payloads, rejected } = extractPayloads("stow", lines)
	for (const line of rejected) {
		context.logger.warn(`Unrecognized stow directive: ${line}`)
	}

	const targets: StowTarget[] = []
	for (const payload of payloads) {
		const target = resolveStowTarget(payload, context.home)
		const fullPath = path.join(target.dir, target.name)
		const stats = await safeStat(fullPath)
		if (!stats.ok) {
			context.logger.warn(stats.error.message)
			continue
		}
		if (!stats.value?.isDirectory()) {
			context.logger.warn(`Directory not found: ${fullPath}`)
			continue
		}
		targets.push(target)
	}
	return targets
}

/**
 * Every run unstows each target and stows it again, so the symlink set
 * always matches the directories' current contents.
 */
export const stowReconciler: Reconciler = {
	directive: "stow",

	async reconcile(lines, context): Promise<BackendReport> {
		if (lines.length === 0) {
			return skipped("stow")
		}

		const targets = await existingTargets(lines, context)
		if (targets.length === 0) {
			context.logger.info("No valid stow directories to process.")
			return skipped("stow")
		}

		const stow = await findFirst(["stow"], context.findExecutable)
		if (!stow) {
			return failed(
				"stow",
				toolMissing("stow", "stow", "GNU stow is not installed; skipping stow directives."),
			)
		}

		const stowArgs = (target: StowTarget, ...extra: string[]) =>
			lazyArgs(() => ["--dir", target.dir, "--target", context.home, ...extra, target.name])

		for (const target of targets) {
			await runStep(context, { args: stowArgs(target, "--delete"), program: stow })
		}

		const applied: string[] = []
		for (const target of targets) {
			const restowed = await runStep(
				context,
				{ args: stowArgs(target), program: stow },
				{ exitCode: EXIT_CODES.dotfilesStowFailed, stage: "install" },
			)
			if (!restowed.ok) {
				return failed("stow", restowed.error, { applied })
			}
			applied.push(path.join(target.dir, target.name))
		}

		return { applied, directive: "stow", removed: [], status: "completed" }
	},
}
