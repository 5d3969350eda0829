import { parse, stringify, TomlError } from "smol-toml"
import { z } from "zod"
import { formatError, toError } from "../../utils/errors.js"
import type { InvalidConfigError, Result } from "../types/errors.js"

export const DEFAULT_METADATA_VERSION = "12"
export const SUPPORTED_METADATA_VERSIONS = ["2", "12"] as const

export interface Settings {
	version: string
	/** Raw toolchain name as the user typed it; resolved on use. */
	defaultToolchain?: string
	/** Canonical directory path to resolved descriptor string. */
	overrides: Record<string, string>
}

const settingsSchema = z.object({
	default_toolchain: z.string().optional(),
	overrides: z.record(z.string()).default({}),
	version: z.string().default(DEFAULT_METADATA_VERSION),
})

export function defaultSettings(): Settings {
	return { overrides: {}, version: DEFAULT_METADATA_VERSION }
}

export function parseSettings(
	contents: string,
	path: string,
): Result<Settings, InvalidConfigError> {
	let raw: unknown
	try {
		raw = parse(contents)
	} catch (error) {
		const message =
			error instanceof TomlError
				? `Invalid TOML in settings: ${error.message}`
				: `Failed to parse settings: ${formatError(error)}`
		return failure(message, path, { rawError: toError(error) })
	}

	const parsed = settingsSchema.safeParse(raw)
	if (!parsed.success) {
		return failure("Settings file does not match the expected shape.", path, {
			zodError: parsed.error,
		})
	}

	const { default_toolchain, overrides, version } = parsed.data
	if (!SUPPORTED_METADATA_VERSIONS.some((supported) => supported === version)) {
		return failure(`unknown metadata version: '${version}'`, path)
	}

	return {
		ok: true,
		value: {
			defaultToolchain: default_toolchain,
			overrides,
			version: DEFAULT_METADATA_VERSION,
		},
	}
}

export function serializeSettings(settings: Settings): string {
	const document: Record<string, unknown> = { version: settings.version }
	if (settings.defaultToolchain !== undefined) {
		document.default_toolchain = settings.defaultToolchain
	}
	document.overrides = settings.overrides
	return stringify(document)
}

function failure(
	message: string,
	path: string,
	extra: Pick<InvalidConfigError, "rawError" | "zodError"> = {},
): Result<Settings, InvalidConfigError> {
	return {
		error: {
			...extra,
			message,
			path,
			source: "settings",
			type: "invalid_config",
		},
		ok: false,
	}
}
