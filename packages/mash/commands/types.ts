import type { BaseError, MashError } from "@mash/core"
import type { ConsolaInstance } from "consola"
import { exitCodeFor } from "@/sync/errors"

// CommandResult models user-facing flow outcomes; core operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; error: MashError }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: MashError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>, logger: ConsolaInstance): void {
	switch (result.status) {
		case "completed":
			logger.success("Done.")
			break
		case "unchanged":
			logger.info(result.reason)
			break
		case "cancelled":
			logger.info("Canceled.")
			break
		case "failed":
			logger.error(formatErrorChain(result.error))
			printRawErrors(result.error, logger)
			process.exitCode = exitCodeFor(result.error)
			break
	}
}

export function formatErrorChain(error: BaseError): string {
	return formatErrorChainLines(error, 0).join("\n")
}

function formatErrorChainLines(error: BaseError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const detailParts = buildDetailParts(error)
	const details = detailParts.length ? ` (${detailParts.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${details}`]

	if (!error.cause && "stderr" in error && typeof error.stderr === "string" && error.stderr) {
		for (const line of error.stderr.split("\n")) {
			lines.push(`${prefix}  | ${line}`)
		}
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`)
		lines.push(...formatErrorChainLines(error.cause, indent + 2))
	}

	return lines
}

function printRawErrors(error: BaseError, logger: ConsolaInstance): void {
	if (error.rawError) {
		logger.debug(error.rawError)
	}
	if (error.cause) {
		printRawErrors(error.cause, logger)
	}
}

function buildDetailParts(error: BaseError): string[] {
	const details: string[] = []
	if ("stage" in error && typeof error.stage === "string") {
		details.push(`stage=${error.stage}`)
	}
	if ("field" in error && typeof error.field === "string") {
		details.push(`field=${error.field}`)
	}
	if ("path" in error && typeof error.path === "string") {
		details.push(`path=${error.path}`)
	}
	if ("operation" in error && typeof error.operation === "string") {
		details.push(`operation=${error.operation}`)
	}
	if ("directive" in error && typeof error.directive === "string") {
		details.push(`directive=${error.directive}`)
	}
	if ("target" in error && typeof error.target === "string") {
		details.push(`target=${error.target}`)
	}
	if ("command" in error && typeof error.command === "string") {
		details.push(`command=${error.command}`)
	}
	if ("exitCode" in error && typeof error.exitCode === "number") {
		details.push(`exitCode=${error.exitCode}`)
	}
	return details
}
