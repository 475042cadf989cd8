import type { DirectiveName } from "./directive"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ConfigurationError = BaseError & {
	type: "configuration"
	field: string
	/** Offending values, e.g. unknown directive names or tried paths */
	values?: string[]
}

export type ValidationError = BaseError & {
	type: "validation"
	field: string
}

export type IoError = BaseError & {
	type: "io"
	path: string
	operation: string
}

export type NotFoundError = BaseError & {
	type: "not_found"
	target: string
	candidates: string[]
}

export type CommandRefusedError = BaseError & {
	type: "command_refused"
	command: string
	pattern: string
}

export type ToolMissingError = BaseError & {
	type: "tool_missing"
	directive: DirectiveName
	target: string
}

export type BackendStage =
	| "bootstrap"
	| "update"
	| "install"
	| "query"
	| "uninstall"
	| "cleanup"

export type ExecutionError = BaseError & {
	type: "execution"
	command: string
	stage: BackendStage
	exitCode: number
	/** Exit code the whole run should report for this failure */
	runExitCode: number
	stderr: string
}

export type CoreError = ConfigurationError | ValidationError | NotFoundError

export type MashError =
	| ConfigurationError
	| ValidationError
	| IoError
	| NotFoundError
	| CommandRefusedError
	| ToolMissingError
	| ExecutionError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
