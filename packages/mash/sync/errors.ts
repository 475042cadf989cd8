import { EXIT_CODES, type MashError } from "@mash/core"
import type { SyncFailure, SyncResult, SyncStage } from "@/sync/types"

export function failSync(stage: SyncStage, error: SyncFailure): SyncResult<never> {
	return {
		error: {
			...error,
			cause: error,
			message: `Sync failed at ${stage}.`,
			stage,
		},
		ok: false,
	}
}

/** Process exit code for an error that ended a backend or the whole run */
export function exitCodeFor(error: MashError): number {
	switch (error.type) {
		case "execution":
			return error.runExitCode
		case "tool_missing":
		case "not_found":
			return EXIT_CODES.missingDependency
		case "configuration":
			return EXIT_CODES.configError
		default:
			return EXIT_CODES.genericError
	}
}
