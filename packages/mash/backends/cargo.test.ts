import { describe, expect, it } from "vitest"
import { cargoBackend, cargoHome, parseCargoInstallList } from "@/backends/cargo"
import { runPackageBackend } from "@/backends/lifecycle"
import { buildTestContext } from "@/tests/helpers"

const INSTALL_LIST = ["ripgrep v14.1.0:", "    rg", "bat v0.24.0:", "    bat", ""].join("\n")

describe("parseCargoInstallList", () => {
	it("keeps crate names and drops their binaries", () => {
		expect(parseCargoInstallList(INSTALL_LIST)).toEqual(["ripgrep", "bat"])
	})

	it("handles crates installed from a path", () => {
		expect(parseCargoInstallList("mytool v0.1.0 (/src/mytool):\n    mytool\n")).toEqual([
			"mytool",
		])
	})

	it("returns nothing for empty output", () => {
		expect(parseCargoInstallList("")).toEqual([])
	})
})

describe("cargoHome", () => {
	it("defaults to ~/.cargo", () => {
		expect(cargoHome(buildTestContext().context)).toBe("/home/tester/.cargo")
	})

	it("honors CARGO_HOME", () => {
		const { context } = buildTestContext({ env: { CARGO_HOME: "/opt/cargo" } })

		expect(cargoHome(context)).toBe("/opt/cargo")
	})
})

describe("cargo backend", () => {
	it("installs each crate and uninstalls the ones no longer listed", async () => {
		const { context, spawned } = buildTestContext({
			available: ["cargo", "rustup"],
			respond: (argv) => (argv[2] === "--list" ? { stdout: INSTALL_LIST } : undefined),
		})

		const report = await runPackageBackend(
			cargoBackend,
			['cargo "ripgrep"', 'cargo "fd-find"'],
			context,
		)

		expect(spawned.commands()).toEqual([
			"/usr/bin/rustup self update",
			"/usr/bin/cargo install-update -a",
			"/usr/bin/cargo install ripgrep",
			"/usr/bin/cargo install fd-find",
			"/usr/bin/cargo install --list",
			"/usr/bin/cargo uninstall bat",
		])
		expect(report).toEqual({
			applied: ["ripgrep", "fd-find"],
			directive: "cargo",
			removed: ["bat"],
			status: "completed",
		})
	})

	it("matches pinned crates by name", async () => {
		const { context } = buildTestContext({
			available: ["cargo", "rustup"],
			respond: (argv) => (argv[2] === "--list" ? { stdout: INSTALL_LIST } : undefined),
		})

		const report = await runPackageBackend(
			cargoBackend,
			['cargo "ripgrep@14.1.0"', 'cargo "bat"'],
			context,
		)

		expect(report.removed).toEqual([])
	})

	it("only warns when cargo-update is not installed", async () => {
		const { context, log } = buildTestContext({
			available: ["cargo", "rustup"],
			respond: (argv) =>
				argv[1] === "install-update" ? { exitCode: 101, stderr: "no such command" } : undefined,
		})

		const report = await runPackageBackend(cargoBackend, ['cargo "ripgrep"'], context)

		expect(report.status).toBe("completed")
		expect(log.of("warn")).toEqual([
			"/usr/bin/cargo install-update -a failed with exit code 101",
			"no such command",
		])
	})

	it("stops at the first crate that fails to install", async () => {
		const { context, spawned } = buildTestContext({
			available: ["cargo", "rustup"],
			respond: (argv) => (argv[2] === "nope" ? { exitCode: 101 } : undefined),
		})

		const report = await runPackageBackend(
			cargoBackend,
			['cargo "nope"', 'cargo "ripgrep"'],
			context,
		)

		expect(spawned.commands().at(-1)).toBe("/usr/bin/cargo install nope")
		expect(report.error?.type === "execution" && report.error.runExitCode).toBe(43)
	})

	it("bootstraps rustup into CARGO_HOME", async () => {
		const available = ["curl", "sh"]
		const { context, spawned } = buildTestContext({
			available,
			respond: (argv) => {
				if (argv[0] === "sh") {
					available.push("/home/tester/.cargo/bin/cargo", "/home/tester/.cargo/bin/rustup")
				}
				return undefined
			},
		})

		const report = await runPackageBackend(cargoBackend, ['cargo "ripgrep"'], context)

		const [download, install] = spawned.calls
		const script = download?.argv[6]
		expect(download?.argv).toEqual([
			"curl",
			"--proto",
			"=https",
			"--tlsv1.2",
			"-sSf",
			"-o",
			script,
			"https://sh.rustup.rs",
		])
		expect(install?.argv).toEqual(["sh", script, "-y"])
		expect(install?.env).toEqual({
			CARGO_HOME: "/home/tester/.cargo",
			RUSTUP_HOME: "/home/tester/.rustup",
		})
		expect(spawned.commands()).toContain("/home/tester/.cargo/bin/cargo install ripgrep")
		expect(report.status).toBe("completed")
	})

	it("needs both cargo and rustup", async () => {
		const { context } = buildTestContext({ available: ["cargo"] })

		const report = await runPackageBackend(cargoBackend, ['cargo "ripgrep"'], context)

		expect(report.error).toEqual({
			directive: "cargo",
			message: "rustup/cargo is not present and it requires curl to install.",
			target: "curl",
			type: "tool_missing",
		})
	})
})
