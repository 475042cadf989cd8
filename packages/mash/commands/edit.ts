import { EXIT_CODES } from "@mash/core"
import { CommandResult } from "@/commands/types"
import { argList, buildCommand } from "@/exec/command"
import { resolveManifestPath } from "@/manifest/discover"
import type { RunContext } from "@/types/context"

const DEFAULT_EDITOR = "vi"

/** `$VISUAL`, then `$EDITOR`, then vi; the value may carry its own arguments */
export function editorArgv(env: RunContext["env"]): string[] {
	const configured = env.VISUAL ?? env.EDITOR ?? DEFAULT_EDITOR
	return configured.split(/\s+/).filter(Boolean)
}

/**
 * Open the resolved manifest in the operator's editor. Completes with the
 * editor's own exit status.
 */
export async function editManifest(
	options: { manifest?: string; cwd: string },
	context: RunContext,
): Promise<CommandResult<number>> {
	const location = await resolveManifestPath({
		cwd: options.cwd,
		env: context.env,
		explicitPath: options.manifest,
		home: context.home,
	})
	if (!location.ok) {
		return CommandResult.failed(location.error)
	}

	const [program = DEFAULT_EDITOR, ...editorArgs] = editorArgv(context.env)
	const command = await buildCommand(
		{ args: argList(...editorArgs, location.value.path), output: "inherit", program },
		context.findExecutable,
	)
	if (!command.ok) {
		return CommandResult.failed(command.error)
	}

	const result = await context.runner.run(command.value)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}
	return CommandResult.completed(result.value.dryRun ? EXIT_CODES.ok : result.value.exitCode)
}
