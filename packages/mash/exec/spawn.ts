import { spawn } from "node:child_process"
import type { OutputMode } from "@/exec/command"

export interface SpawnRequest {
	argv: ReadonlyArray<string>
	env?: Readonly<Record<string, string>>
	output: OutputMode
}

export interface SpawnOutcome {
	exitCode: number
	stdout: string
	stderr: string
}

export type Spawner = (request: SpawnRequest) => Promise<SpawnOutcome>

/** Exit status reported when the process could not be started at all */
export const SPAWN_FAILED_EXIT_CODE = 127

/**
 * Spawn without a shell and wait for the process to exit. stdin is always
 * inherited so tools such as sudo can prompt.
 */
export function createProcessSpawner(baseEnv: NodeJS.ProcessEnv): Spawner {
	return (request) =>
		new Promise((resolve) => {
			const [file, ...args] = request.argv
			if (!file) {
				resolve({
					exitCode: SPAWN_FAILED_EXIT_CODE,
					stderr: "Empty command.",
					stdout: "",
				})
				return
			}

			const child = spawn(file, args, {
				env: { ...baseEnv, ...request.env },
				stdio: ["inherit", request.output === "inherit" ? "inherit" : "pipe", "pipe"],
			})

			let stdout = ""
			let stderr = ""
			let settled = false
			child.stdout?.setEncoding("utf8")
			child.stderr?.setEncoding("utf8")
			child.stdout?.on("data", (chunk: string) => {
				stdout += chunk
			})
			child.stderr?.on("data", (chunk: string) => {
				stderr += chunk
			})

			child.on("error", (error) => {
				if (settled) return
				settled = true
				resolve({ exitCode: SPAWN_FAILED_EXIT_CODE, stderr: error.message, stdout })
			})

			child.on("close", (code) => {
				if (settled) return
				settled = true
				resolve({ exitCode: code ?? 1, stderr, stdout })
			})
		})
}
