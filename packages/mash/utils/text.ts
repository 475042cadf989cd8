import path from "node:path"

/** Non-empty trimmed lines of a command's output */
export function splitLines(output: string): string[] {
	return output
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean)
}

/** Expand a leading `~` to `home` */
export function expandHome(value: string, home: string): string {
	if (value === "~") {
		return home
	}
	if (value.startsWith("~/")) {
		return path.join(home, value.slice(2))
	}
	return value
}
