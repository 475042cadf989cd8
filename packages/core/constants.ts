/**
 * Shared constants for manifest parsing and directive dispatch.
 */

import type { DirectiveName, ExplicitDirective } from "./types/directive"

/** Manifest used when no path is given and no environment variable is set */
export const DEFAULT_MANIFEST_FILENAME = "Brewfile"

/** Environment variables consulted, in order, for the manifest location */
export const MANIFEST_PATH_VARS = ["BREWFILE_PATH", "MASHFILE_PATH"] as const

/** Directives recognized by an explicit keyword, in classification order */
export const EXPLICIT_DIRECTIVES: ReadonlyArray<ExplicitDirective> = [
	"shell",
	"apt",
	"cargo",
	"uv",
	"stow",
]

/** Lines matching no explicit keyword belong to this bucket */
export const DEFAULT_DIRECTIVE = "brew" satisfies DirectiveName

/** Where the default bucket sits in execution order */
const DEFAULT_DIRECTIVE_PRIORITY = 2

/** Canonical execution order: shell, apt, brew, cargo, uv, stow */
export const ALL_DIRECTIVES: ReadonlyArray<DirectiveName> = [
	...EXPLICIT_DIRECTIVES.slice(0, DEFAULT_DIRECTIVE_PRIORITY),
	DEFAULT_DIRECTIVE,
	...EXPLICIT_DIRECTIVES.slice(DEFAULT_DIRECTIVE_PRIORITY),
]

/** Setting this variable to any value allows `shell` directives to run */
export const LONG_OVERRIDE_VAR =
	"IAMOKAYWITHMASHDOTPYEXECUTINGARBITRARYSHELLCOMMANDSANDIKNOWTHEMANYMANYRISKSOFLETTINGASCRIPTDOTHISNONSENSE"

/** Setting this variable to `1` allows `shell` directives to run */
export const SIMPLE_OVERRIDE_VAR = "MASH_EXEC_UNSAFE"

/**
 * Process exit codes.
 *
 * Each backend owns a block of ten: bootstrap, update, install, cleanup,
 * uninstall, in that order.
 */
export const EXIT_CODES = {
	aptBootstrapFailed: 21,
	aptCleanupFailed: 24,
	aptInstallFailed: 23,
	aptUninstallFailed: 25,
	aptUpdateFailed: 22,
	brewBootstrapFailed: 31,
	brewCleanupFailed: 34,
	brewInstallFailed: 33,
	brewUninstallFailed: 35,
	brewUpdateFailed: 32,
	cargoBootstrapFailed: 41,
	cargoCleanupFailed: 44,
	cargoInstallFailed: 43,
	cargoUninstallFailed: 45,
	cargoUpdateFailed: 42,
	configError: 2,
	dotfilesStowFailed: 12,
	genericError: 1,
	interrupted: 4,
	managerExecFailed: 92,
	missingDependency: 3,
	ok: 0,
	uvBootstrapFailed: 51,
	uvCleanupFailed: 54,
	uvInstallFailed: 53,
	uvUninstallFailed: 55,
	uvUpdateFailed: 52,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]
