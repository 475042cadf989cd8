import { describe, expect, it } from "vitest"
import { EXPLICIT_DIRECTIVES } from "../constants"
import { classifyLines, readManifest } from "./classify"
import { splitManifest } from "./normalize"

const MANIFEST = `
# system
apt "curl"
apt 'git'
shell 'echo hi'
brew "wget"
cask "firefox"
vim
cargo "ripgrep"
uv "ruff"
stow "~/dotfiles/zsh"
`

describe("classifyLines", () => {
	it("sorts lines into buckets by keyword", () => {
		const buckets = readManifest(MANIFEST)

		expect(buckets.get("apt")).toEqual(['apt "curl"', "apt 'git'"])
		expect(buckets.get("shell")).toEqual(["shell 'echo hi'"])
		expect(buckets.get("cargo")).toEqual(['cargo "ripgrep"'])
		expect(buckets.get("uv")).toEqual(['uv "ruff"'])
		expect(buckets.get("stow")).toEqual(['stow "~/dotfiles/zsh"'])
		expect(buckets.get("brew")).toEqual(['brew "wget"', 'cask "firefox"', "vim"])
	})

	it("creates a bucket for every keyword even when empty", () => {
		const buckets = classifyLines(["vim"], EXPLICIT_DIRECTIVES)

		expect([...buckets.keys()]).toEqual(["shell", "apt", "cargo", "uv", "stow", "brew"])
		expect(buckets.get("apt")).toEqual([])
		expect(buckets.get("brew")).toEqual(["vim"])
	})

	it("puts every line in exactly one bucket", () => {
		const lines = splitManifest(MANIFEST)
		const buckets = classifyLines(lines, EXPLICIT_DIRECTIVES)

		const all = [...buckets.values()].flat()
		expect(all).toHaveLength(lines.length)
		expect([...all].sort()).toEqual([...lines].sort())
	})

	it("sends keyword lines without quotes to the default bucket", () => {
		const buckets = classifyLines(["apt curl", "shell echo hi"], EXPLICIT_DIRECTIVES)

		expect(buckets.get("apt")).toEqual([])
		expect(buckets.get("shell")).toEqual([])
		expect(buckets.get("brew")).toEqual(["apt curl", "shell echo hi"])
	})

	it("does not treat a keyword prefix as the keyword", () => {
		const buckets = classifyLines(['aptitude "x"', 'uvx "y"'], EXPLICIT_DIRECTIVES)

		expect(buckets.get("apt")).toEqual([])
		expect(buckets.get("uv")).toEqual([])
		expect(buckets.get("brew")).toEqual(['aptitude "x"', 'uvx "y"'])
	})

	it("yields identical buckets for the same input", () => {
		expect(readManifest(MANIFEST)).toEqual(readManifest(MANIFEST))
	})

	it("gives the same buckets regardless of keyword order", () => {
		const lines = splitManifest(MANIFEST)
		const forward = classifyLines(lines, EXPLICIT_DIRECTIVES)
		const reversed = classifyLines(lines, [...EXPLICIT_DIRECTIVES].reverse())

		for (const keyword of EXPLICIT_DIRECTIVES) {
			expect(reversed.get(keyword)).toEqual(forward.get(keyword))
		}
		expect(reversed.get("brew")).toEqual(forward.get("brew"))
	})

	it("classifies the mixed example", () => {
		const buckets = readManifest("apt \"curl\"\nshell 'echo hi'\nvim\n")

		expect(buckets.get("apt")).toEqual(['apt "curl"'])
		expect(buckets.get("shell")).toEqual(["shell 'echo hi'"])
		expect(buckets.get("brew")).toEqual(["vim"])
	})
})
