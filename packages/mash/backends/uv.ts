import path from "node:path"
import { EXIT_CODES, extractPayloads, uvIdentity } from "@mash/core"
import { runInstallerScript } from "@/backends/bootstrap"
import { inSequence, type PackageBackend } from "@/backends/lifecycle"
import { runQuery, runStep } from "@/backends/step"
import type { StageExitCodes } from "@/backends/types"
import { argList } from "@/exec/command"
import { findFirst } from "@/exec/lookup"
import type { RunContext } from "@/types/context"

const UV_INSTALLER_URL = "https://astral.sh/uv/install.sh"

const TOOL_LINE = /^(\S+)\s+v\d/

const codes = {
	bootstrap: EXIT_CODES.uvBootstrapFailed,
	cleanup: EXIT_CODES.uvCleanupFailed,
	install: EXIT_CODES.uvInstallFailed,
	uninstall: EXIT_CODES.uvUninstallFailed,
	update: EXIT_CODES.uvUpdateFailed,
} satisfies StageExitCodes

function uvBinDir(context: RunContext): string {
	return path.join(context.env.UV_HOME ?? path.join(context.home, ".local", "uv"), "bin")
}

/**
 * `uv tool list` prints `ruff v0.5.0` per tool, then `- ruff` per
 * executable it provides.
 */
export function parseUvToolList(output: string): string[] {
	const tools: string[] = []
	for (const line of output.split("\n")) {
		const name = TOOL_LINE.exec(line)?.[1]
		if (name) {
			tools.push(name)
		}
	}
	return tools
}

export const uvBackend: PackageBackend<string> = {
	bootstrap: (context) =>
		runInstallerScript(
			{
				curlArgs: ["-LsSf"],
				directive: "uv",
				displayName: "uv",
				env: { UV_INSTALL_DIR: uvBinDir(context) },
				exitCode: codes.bootstrap,
				interpreter: "sh",
				url: UV_INSTALLER_URL,
			},
			context,
		),

	cleanup: (uv, context) =>
		runStep(context, { args: argList("cache", "prune"), program: uv }),

	desired: (lines) => {
		const { payloads, rejected } = extractPayloads("uv", lines)
		return { packages: payloads, rejected }
	},

	directive: "uv",

	displayName: "uv",

	drift: {
		identify: uvIdentity,

		list: async (uv, context) => {
			const listed = await runQuery(
				context,
				{ args: argList("tool", "list"), program: uv },
				{ exitCode: codes.uninstall, stage: "query" },
			)
			if (!listed.ok) {
				return listed
			}
			if (listed.value === null) {
				return { ok: true, value: null }
			}
			return { ok: true, value: parseUvToolList(listed.value) }
		},

		remove: (uv, packages, context) =>
			runStep(
				context,
				{ args: argList("tool", "uninstall", ...packages), program: uv },
				{ exitCode: codes.uninstall, stage: "uninstall" },
			),
	},

	install: (uv, packages, context) =>
		inSequence(
			packages.map(
				(name) => () =>
					runStep(
						context,
						{ args: argList("tool", "install", name), program: uv },
						{ exitCode: codes.install, stage: "install" },
					),
			),
		),

	locate: (context) =>
		findFirst(["uv", path.join(uvBinDir(context), "uv")], context.findExecutable),

	update: (uv, context) =>
		runStep(context, { args: argList("self", "update"), program: uv }),
}
