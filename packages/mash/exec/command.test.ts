import { describe, expect, it, vi } from "vitest"
import { runStep } from "@/backends/step"
import { argList, buildCommand, formatArgv, lazyArgs } from "@/exec/command"
import { buildTestContext, fakeLookup } from "@/tests/helpers"
import "@/tests/helpers/assertions"

describe("buildCommand", () => {
	it("uses the first candidate that exists", async () => {
		const result = await buildCommand(
			{ args: argList("--version"), program: ["podman", "docker"] },
			fakeLookup(["docker"]),
		)

		expect(result).toBeOk()
		if (result.ok) {
			expect(result.value.program).toBe("docker")
			expect(result.value.argv).toEqual(["docker", "--version"])
		}
	})

	it("fails with every candidate named when none exist", async () => {
		const result = await buildCommand({ program: ["podman", "docker"] }, fakeLookup([]))

		expect(result).toEqual({
			error: {
				candidates: ["podman", "docker"],
				message: "Could not find any executables in podman, docker.",
				target: "podman",
				type: "not_found",
			},
			ok: false,
		})
	})

	it("passes a single string argument through unsplit", async () => {
		const result = await buildCommand(
			{ args: "echo a b", program: "/bin/sh" },
			fakeLookup(["/bin/sh"]),
		)

		expect(result.ok && result.value.argv).toEqual(["/bin/sh", "echo a b"])
	})

	it("prepends sudo", async () => {
		const result = await buildCommand(
			{ args: argList("update"), program: "apt", sudo: true },
			fakeLookup(["apt"]),
		)

		expect(result.ok && result.value.argv).toEqual(["sudo", "apt", "update"])
	})

	it("resolves lazy arguments exactly once", async () => {
		const produce = vi.fn(() => ["--dir", "/tmp"])

		const result = await buildCommand(
			{ args: lazyArgs(produce), program: "stow" },
			fakeLookup(["stow"]),
		)

		expect(produce).toHaveBeenCalledTimes(1)
		expect(result.ok && result.value.args).toEqual(["--dir", "/tmp"])
	})

	it("defaults to captured output", async () => {
		const result = await buildCommand({ program: "apt" }, fakeLookup(["apt"]))

		expect(result.ok && result.value.output).toBe("capture")
	})

	it("freezes the resolved command", async () => {
		const result = await buildCommand({ args: argList("x"), program: "apt" }, fakeLookup(["apt"]))

		expect(result.ok && Object.isFrozen(result.value.argv)).toBe(true)
	})

	it("refuses commands matching the deny-list", async () => {
		const result = await buildCommand(
			{ args: argList("-c", "rm -rf /tmp/x"), program: "/bin/sh" },
			fakeLookup(["/bin/sh"]),
		)

		expect(result).toBeErrOfType("command_refused")
		if (!result.ok && result.error.type === "command_refused") {
			expect(result.error.message).toBe(
				"Refusing to run dangerous command: /bin/sh -c 'rm -rf /tmp/x'",
			)
		}
	})

	it("refuses a pattern spread across arguments", async () => {
		const result = await buildCommand(
			{ args: argList("-rf", "/tmp/x"), program: "rm" },
			fakeLookup(["rm"]),
		)

		expect(result).toBeErrOfType("command_refused")
	})

	it("refuses deny-listed commands in dry run too", async () => {
		const { context, log, spawned } = buildTestContext({ available: ["/bin/sh"], dryRun: true })

		const result = await runStep(
			context,
			{ args: argList("-c", "rm -rf /tmp/x"), program: "/bin/sh" },
			{ exitCode: 1, stage: "install" },
		)

		expect(result).toBeErrOfType("command_refused")
		expect(spawned.calls).toHaveLength(0)
		expect(log.of("info")).toEqual([])
	})
})

describe("formatArgv", () => {
	it("quotes arguments the shell would split", () => {
		expect(formatArgv(["brew", "bundle", "--file", "/tmp/my file"])).toBe(
			"brew bundle --file '/tmp/my file'",
		)
	})

	it("escapes single quotes and shows empty arguments", () => {
		expect(formatArgv(["echo", "it's", ""])).toBe(`echo 'it'"'"'s' ''`)
	})
})
