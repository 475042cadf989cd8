import path from "node:path"
import { cargoIdentity, EXIT_CODES, extractPayloads } from "@mash/core"
import { runInstallerScript } from "@/backends/bootstrap"
import { inSequence, type PackageBackend } from "@/backends/lifecycle"
import { runQuery, runStep } from "@/backends/step"
import type { StageExitCodes } from "@/backends/types"
import { argList } from "@/exec/command"
import { findFirst } from "@/exec/lookup"
import type { RunContext } from "@/types/context"

export interface CargoTools {
	cargo: string
	rustup: string
}

const RUSTUP_INIT_URL = "https://sh.rustup.rs"

const codes = {
	bootstrap: EXIT_CODES.cargoBootstrapFailed,
	cleanup: EXIT_CODES.cargoCleanupFailed,
	install: EXIT_CODES.cargoInstallFailed,
	uninstall: EXIT_CODES.cargoUninstallFailed,
	update: EXIT_CODES.cargoUpdateFailed,
} satisfies StageExitCodes

export function cargoHome(context: RunContext): string {
	return context.env.CARGO_HOME ?? path.join(context.home, ".cargo")
}

/**
 * `cargo install --list` prints each crate on an unindented line
 * (`ripgrep v14.1.0:`) followed by its indented binaries.
 */
export function parseCargoInstallList(output: string): string[] {
	const crates: string[] = []
	for (const line of output.split("\n")) {
		if (!line.trim() || /^\s/.test(line) || !line.includes(" ")) {
			continue
		}
		const name = line.split(/\s+/, 1)[0]
		if (name) {
			crates.push(name)
		}
	}
	return crates
}

export const cargoBackend: PackageBackend<CargoTools> = {
	bootstrap: (context) =>
		runInstallerScript(
			{
				curlArgs: ["--proto", "=https", "--tlsv1.2", "-sSf"],
				directive: "cargo",
				displayName: "rustup/cargo",
				env: {
					CARGO_HOME: cargoHome(context),
					RUSTUP_HOME: context.env.RUSTUP_HOME ?? path.join(context.home, ".rustup"),
				},
				exitCode: codes.bootstrap,
				interpreter: "sh",
				scriptArgs: ["-y"],
				url: RUSTUP_INIT_URL,
			},
			context,
		),

	desired: (lines) => {
		const { payloads, rejected } = extractPayloads("cargo", lines)
		return { packages: payloads, rejected }
	},

	directive: "cargo",

	displayName: "cargo",

	drift: {
		identify: cargoIdentity,

		list: async (tools, context) => {
			const listed = await runQuery(
				context,
				{ args: argList("install", "--list"), program: tools.cargo },
				{ exitCode: codes.uninstall, stage: "query" },
			)
			if (!listed.ok) {
				return listed
			}
			if (listed.value === null) {
				return { ok: true, value: null }
			}
			return { ok: true, value: parseCargoInstallList(listed.value) }
		},

		remove: (tools, packages, context) =>
			inSequence(
				packages.map(
					(name) => () =>
						runStep(
							context,
							{ args: argList("uninstall", name), program: tools.cargo },
							{ exitCode: codes.uninstall, stage: "uninstall" },
						),
				),
			),
	},

	install: (tools, packages, context) =>
		inSequence(
			packages.map(
				(name) => () =>
					runStep(
						context,
						{ args: argList("install", name), program: tools.cargo },
						{ exitCode: codes.install, stage: "install" },
					),
			),
		),

	locate: async (context) => {
		const binDir = path.join(cargoHome(context), "bin")
		const cargo = await findFirst(
			["cargo", path.join(binDir, "cargo")],
			context.findExecutable,
		)
		const rustup = await findFirst(
			["rustup", path.join(binDir, "rustup")],
			context.findExecutable,
		)
		return cargo && rustup ? { cargo, rustup } : null
	},

	update: (tools, context) =>
		inSequence([
			() => runStep(context, { args: argList("self", "update"), program: tools.rustup }),
			// Needs the cargo-update crate; without it this only warns.
			() => runStep(context, { args: argList("install-update", "-a"), program: tools.cargo }),
		]),
}
