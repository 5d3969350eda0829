import { homedir } from "node:os"
import path from "node:path"
import { z } from "zod"
import type { Result, ValidationError } from "./core/types/errors.js"

const str = () => z.string().trim().min(1)

const emptyAsUnset = (value: unknown) => (value === "" ? undefined : value)

export const schema = z.object({
	LEANUP_HOME: z.preprocess(emptyAsUnset, str().optional()),
	LEANUP_OFFLINE: z
		.preprocess(emptyAsUnset, z.enum(["0", "1", "false", "true"]).optional())
		.transform((value) => value === "1" || value === "true"),
	LEANUP_RECURSION_COUNT: z.coerce.number().int().nonnegative().optional().default(0),
	LEANUP_TOOLCHAIN: z.preprocess(emptyAsUnset, str().optional()),
})

export interface LeanupEnv {
	homeDir: string
	offline: boolean
	recursionCount: number
	toolchainOverride?: string
}

export const HOME_ENV = "LEANUP_HOME"
export const TOOLCHAIN_ENV = "LEANUP_TOOLCHAIN"
export const RECURSION_COUNT_ENV = "LEANUP_RECURSION_COUNT"

export function readEnv(
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): Result<LeanupEnv, ValidationError> {
	const parsed = schema.safeParse(env)
	if (!parsed.success) {
		const field = parsed.error.issues[0]?.path.join(".") ?? "environment"
		return {
			error: {
				field,
				message: "Invalid environment configuration.",
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const { LEANUP_HOME, LEANUP_OFFLINE, LEANUP_RECURSION_COUNT, LEANUP_TOOLCHAIN } =
		parsed.data
	return {
		ok: true,
		value: {
			homeDir: LEANUP_HOME
				? path.resolve(cwd, LEANUP_HOME)
				: path.join(homedir(), ".leanup"),
			offline: LEANUP_OFFLINE,
			recursionCount: LEANUP_RECURSION_COUNT,
			toolchainOverride: LEANUP_TOOLCHAIN,
		},
	}
}
