import type { DirectiveName } from "@mash/core"
import { aptBackend } from "@/backends/apt"
import { brewBackend } from "@/backends/brew"
import { cargoBackend } from "@/backends/cargo"
import { type PackageBackend, runPackageBackend } from "@/backends/lifecycle"
import { shellReconciler } from "@/backends/shell"
import { stowReconciler } from "@/backends/stow"
import type { Reconciler } from "@/backends/types"
import { uvBackend } from "@/backends/uv"

function packageReconciler<Tool>(backend: PackageBackend<Tool>): Reconciler {
	return {
		directive: backend.directive,
		reconcile: (lines, context) => runPackageBackend(backend, lines, context),
	}
}

export function reconcilerFor(directive: DirectiveName): Reconciler {
	switch (directive) {
		case "shell":
			return shellReconciler
		case "apt":
			return packageReconciler(aptBackend)
		case "brew":
			return packageReconciler(brewBackend)
		case "cargo":
			return packageReconciler(cargoBackend)
		case "uv":
			return packageReconciler(uvBackend)
		case "stow":
			return stowReconciler
		default: {
			const unreachable: never = directive
			throw new Error(`Unhandled directive: ${String(unreachable)}`)
		}
	}
}
