import { aptIdentity, EXIT_CODES, extractPayloads } from "@mash/core"
import { inSequence, type PackageBackend } from "@/backends/lifecycle"
import { runQuery, runStep } from "@/backends/step"
import type { StageExitCodes } from "@/backends/types"
import { argList } from "@/exec/command"
import { findFirst } from "@/exec/lookup"
import { splitLines } from "@/utils/text"

const codes = {
	bootstrap: EXIT_CODES.aptBootstrapFailed,
	cleanup: EXIT_CODES.aptCleanupFailed,
	install: EXIT_CODES.aptInstallFailed,
	uninstall: EXIT_CODES.aptUninstallFailed,
	update: EXIT_CODES.aptUpdateFailed,
} satisfies StageExitCodes

/** apt has no bootstrap: a system without it is not a Debian derivative */
export const aptBackend: PackageBackend<string> = {
	cleanup: (apt, context) =>
		inSequence([
			() => runStep(context, { args: argList("autoremove", "-y"), program: apt, sudo: true }),
			() => runStep(context, { args: argList("autoclean"), program: apt, sudo: true }),
		]),

	desired: (lines) => {
		const { payloads, rejected } = extractPayloads("apt", lines)
		return { packages: payloads, rejected }
	},

	directive: "apt",

	displayName: "apt",

	drift: {
		identify: aptIdentity,

		list: async (_apt, context) => {
			const listed = await runQuery(
				context,
				{ args: argList("showmanual"), program: "apt-mark" },
				{ exitCode: codes.uninstall, stage: "query" },
			)
			if (!listed.ok) {
				return listed
			}
			if (listed.value === null) {
				return { ok: true, value: null }
			}
			return { ok: true, value: splitLines(listed.value) }
		},

		remove: (apt, packages, context) =>
			runStep(
				context,
				{ args: argList("remove", "--purge", "-y", ...packages), program: apt, sudo: true },
				{ exitCode: codes.uninstall, stage: "uninstall" },
			),
	},

	install: (apt, packages, context) =>
		runStep(
			context,
			{ args: argList("install", "-y", ...packages), program: apt, sudo: true },
			{ exitCode: codes.install, stage: "install" },
		),

	locate: (context) => findFirst(["apt"], context.findExecutable),

	update: (apt, context) =>
		inSequence([
			() => runStep(context, { args: argList("update"), program: apt, sudo: true }),
			() => runStep(context, { args: argList("upgrade", "-y"), program: apt, sudo: true }),
		]),
}
