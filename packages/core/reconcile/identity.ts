/**
 * Package identity per backend: the part of a manifest payload (or of a
 * backend's listing) that names the package, without version pins.
 */

/** `curl=7.88.1-10` and `curl/bookworm-backports` are both `curl` */
export function aptIdentity(value: string): string {
	return value.trim().split(/[=/]/, 1)[0] ?? ""
}

/** `ripgrep@14.1.0` is `ripgrep` */
export function cargoIdentity(value: string): string {
	return value.trim().split(/[@\s]/, 1)[0] ?? ""
}

const PEP508_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*/

/** PEP 503 normalized name, so `Ruff_LSP>=0.1` and `ruff-lsp` agree */
export function uvIdentity(value: string): string {
	const name = PEP508_NAME.exec(value.trim())?.[0] ?? value.trim()
	return name.toLowerCase().replace(/[-_.]+/g, "-")
}
