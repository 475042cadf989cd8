/**
 * @mash/core
 *
 * Process-free manifest parsing, ordering and diffing.
 */

export {
	ALL_DIRECTIVES,
	DEFAULT_DIRECTIVE,
	DEFAULT_MANIFEST_FILENAME,
	EXIT_CODES,
	type ExitCode,
	EXPLICIT_DIRECTIVES,
	LONG_OVERRIDE_VAR,
	MANIFEST_PATH_VARS,
	SIMPLE_OVERRIDE_VAR,
} from "./constants"
export { classifyLines, readManifest } from "./manifest/classify"
export { normalizeLines, splitManifest } from "./manifest/normalize"
export { directivePattern, payloadPattern } from "./manifest/patterns"
export { type ExtractedPayloads, extractPayload, extractPayloads } from "./manifest/payload"
export { buildPlan, isArm, isDirectiveName, isMacos } from "./plan/order"
export { computeRemovals, type IdentifyPackage } from "./reconcile/diff"
export { aptIdentity, cargoIdentity, uvIdentity } from "./reconcile/identity"
export { DANGEROUS_SHELL_PATTERNS, findDangerousPattern } from "./safety/dangerous"
export type {
	DirectiveBuckets,
	DirectiveName,
	ExplicitDirective,
	ManifestLine,
	OrderedPlan,
	PlanEntry,
	Platform,
} from "./types/directive"
export type {
	BackendStage,
	BaseError,
	CommandRefusedError,
	ConfigurationError,
	CoreError,
	ExecutionError,
	IoError,
	MashError,
	NotFoundError,
	Result,
	ToolMissingError,
	ValidationError,
} from "./types/error"
