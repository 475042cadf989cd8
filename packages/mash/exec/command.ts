import {
	type CommandRefusedError,
	findDangerousPattern,
	type NotFoundError,
	type Result,
} from "@mash/core"
import type { FindExecutable } from "@/exec/lookup"

/** Arguments are either fixed or produced once, when the command is built */
export type CommandArgs =
	| { kind: "list"; values: ReadonlyArray<string> }
	| { kind: "thunk"; produce: () => ReadonlyArray<string> }

export type OutputMode = "capture" | "inherit"

export interface CommandSpec {
	/** Candidate executables, first one found wins */
	program: string | ReadonlyArray<string>
	/** A single string is passed as one argument, never split */
	args?: CommandArgs | string
	sudo?: boolean
	env?: Readonly<Record<string, string>>
	/** `inherit` sends stdout to the parent console */
	output?: OutputMode
}

export interface ResolvedCommand {
	readonly program: string
	readonly args: ReadonlyArray<string>
	readonly sudo: boolean
	readonly env?: Readonly<Record<string, string>>
	readonly output: OutputMode
	readonly argv: ReadonlyArray<string>
}

export type BuildCommandResult = Result<ResolvedCommand, NotFoundError | CommandRefusedError>

export function argList(...values: string[]): CommandArgs {
	return { kind: "list", values }
}

export function lazyArgs(produce: () => ReadonlyArray<string>): CommandArgs {
	return { kind: "thunk", produce }
}

export async function buildCommand(
	spec: CommandSpec,
	findExecutable: FindExecutable,
): Promise<BuildCommandResult> {
	const candidates = typeof spec.program === "string" ? [spec.program] : [...spec.program]

	let program: string | null = null
	for (const candidate of candidates) {
		const lookup = await findExecutable(candidate)
		if (lookup.found) {
			program = candidate
			break
		}
	}

	if (program === null) {
		return {
			error: {
				candidates,
				message: `Could not find any executables in ${candidates.join(", ")}.`,
				target: candidates[0] ?? "",
				type: "not_found",
			},
			ok: false,
		}
	}

	const args = resolveArgs(spec.args)
	const sudo = spec.sudo ?? false
	const argv = sudo ? ["sudo", program, ...args] : [program, ...args]

	const pattern = findDangerousPattern(argv)
	if (pattern) {
		const command = formatArgv(argv)
		return {
			error: {
				command,
				message: `Refusing to run dangerous command: ${command}`,
				pattern: pattern.source,
				type: "command_refused",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: Object.freeze({
			args: Object.freeze(args),
			argv: Object.freeze(argv),
			env: spec.env,
			output: spec.output ?? "capture",
			program,
			sudo,
		}),
	}
}

export function formatCommand(command: ResolvedCommand): string {
	return formatArgv(command.argv)
}

export function formatArgv(argv: ReadonlyArray<string>): string {
	return argv.map(quoteArg).join(" ")
}

function resolveArgs(args: CommandSpec["args"]): string[] {
	if (args === undefined) {
		return []
	}
	if (typeof args === "string") {
		return [args]
	}
	return args.kind === "list" ? [...args.values] : [...args.produce()]
}

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/

function quoteArg(value: string): string {
	if (value === "") {
		return "''"
	}
	if (SAFE_ARG.test(value)) {
		return value
	}
	return `'${value.replace(/'/g, `'"'"'`)}'`
}
