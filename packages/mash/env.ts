import {
	LONG_OVERRIDE_VAR,
	type Result,
	SIMPLE_OVERRIDE_VAR,
	type ValidationError,
} from "@mash/core"
import { z } from "zod"

const blankAsUnset = (value: unknown) =>
	typeof value === "string" && value.trim() === "" ? undefined : value

const str = () => z.preprocess(blankAsUnset, z.string().trim().min(1).optional())

export const envSchema = z.object({
	BREWFILE_PATH: str(),
	CARGO_HOME: str(),
	EDITOR: str(),
	HOME: str(),
	HOMEBREW_PREFIX: str(),
	[LONG_OVERRIDE_VAR]: z.string().optional(),
	MASHFILE_PATH: str(),
	PATH: z.string().optional().default(""),
	RUSTUP_HOME: str(),
	[SIMPLE_OVERRIDE_VAR]: z.string().optional(),
	UV_HOME: str(),
	VISUAL: str(),
})

export type MashEnv = z.infer<typeof envSchema>

export function loadEnv(
	source: Record<string, string | undefined>,
): Result<MashEnv, ValidationError> {
	const parsed = envSchema.safeParse(source)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		return {
			error: {
				field: issue ? issue.path.join(".") : "env",
				message: `Invalid environment: ${issue?.message ?? "unknown issue"}.`,
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: parsed.data }
}

/** Whether the environment alone allows `shell` directives to run */
export function shellOverrideEnabled(env: MashEnv): boolean {
	return env[LONG_OVERRIDE_VAR] !== undefined || env[SIMPLE_OVERRIDE_VAR] === "1"
}
