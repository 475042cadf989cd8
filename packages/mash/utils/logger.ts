import { type ConsolaInstance, createConsola } from "consola"

export interface LoggerOptions {
	verbose: boolean
	quiet: boolean
}

const LEVEL_QUIET = 1
const LEVEL_DEFAULT = 3
const LEVEL_VERBOSE = 4

export function createLogger(options: LoggerOptions): ConsolaInstance {
	return createConsola({
		level: options.verbose ? LEVEL_VERBOSE : options.quiet ? LEVEL_QUIET : LEVEL_DEFAULT,
		throttle: 0,
	})
}
