import { ALL_DIRECTIVES } from "@mash/core"
import { describe, expect, it } from "vitest"
import { reconcilerFor } from "@/backends/registry"
import { shellReconciler } from "@/backends/shell"
import { stowReconciler } from "@/backends/stow"

describe("reconcilerFor", () => {
	it("returns a reconciler for every directive", () => {
		for (const directive of ALL_DIRECTIVES) {
			expect(reconcilerFor(directive).directive).toBe(directive)
		}
	})

	it("uses the dedicated shell and stow reconcilers", () => {
		expect(reconcilerFor("shell")).toBe(shellReconciler)
		expect(reconcilerFor("stow")).toBe(stowReconciler)
	})
})
