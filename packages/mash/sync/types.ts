import type { ConfigurationError, IoError, OrderedPlan, Result } from "@mash/core"
import type { BackendReport } from "@/backends/types"

export type SyncStage = "discover" | "read" | "plan" | "reconcile"

/** Failures that end a run before any backend starts */
export type SyncFailure = ConfigurationError | IoError

export type SyncError = SyncFailure & { stage: SyncStage }

export type SyncResult<T> = Result<T, SyncError>

export interface SyncSummary {
	manifestPath: string
	plan: OrderedPlan
	reports: BackendReport[]
	/** Exit code of the first failed backend, 0 when none failed */
	exitCode: number
	dryRun: boolean
}

export interface SyncOptions {
	/** Manifest path given on the command line */
	manifest?: string
	cwd: string
}
