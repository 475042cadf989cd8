import type { DirectiveName, ManifestLine, MashError } from "@mash/core"
import type { RunContext } from "@/types/context"

export type BackendStatus = "completed" | "skipped" | "failed"

export interface BackendReport {
	directive: DirectiveName
	status: BackendStatus
	/** Packages, targets or commands applied */
	applied: string[]
	removed: string[]
	error?: MashError
}

export interface Reconciler {
	directive: DirectiveName
	reconcile(lines: ManifestLine[], context: RunContext): Promise<BackendReport>
}

/** Run exit codes for each failing stage of one backend */
export interface StageExitCodes {
	bootstrap: number
	update: number
	install: number
	cleanup: number
	uninstall: number
}

export function skipped(directive: DirectiveName): BackendReport {
	return { applied: [], directive, removed: [], status: "skipped" }
}

export function failed(
	directive: DirectiveName,
	error: MashError,
	progress: { applied?: string[]; removed?: string[] } = {},
): BackendReport {
	return {
		applied: progress.applied ?? [],
		directive,
		error,
		removed: progress.removed ?? [],
		status: "failed",
	}
}
