import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import { formatError, toError } from "../../utils/errors.js"
import { readRegularFileIfExists } from "../io/fs.js"
import type { InvalidConfigError, IoError, Result } from "../types/errors.js"

export const LEANPKG_FILE = "leanpkg.toml"

const leanpkgSchema = z
	.object({
		package: z
			.object({
				lean_version: z.string().optional(),
			})
			.passthrough()
			.optional(),
	})
	.passthrough()

/**
 * `package.lean_version` of a legacy leanpkg.toml. Absent file or field yields null.
 */
export async function readLeanpkgVersion(
	filePath: string,
): Promise<Result<string | null, InvalidConfigError | IoError>> {
	const contents = await readRegularFileIfExists(filePath)
	if (!contents.ok || contents.value === null) {
		return contents
	}

	return parseLeanpkgVersion(contents.value, filePath)
}

export function parseLeanpkgVersion(
	contents: string,
	filePath: string,
): Result<string | null, InvalidConfigError> {
	let raw: unknown
	try {
		raw = parse(contents)
	} catch (error) {
		const message =
			error instanceof TomlError
				? `Invalid TOML in ${filePath}: ${error.message}`
				: `Failed to parse ${filePath}: ${formatError(error)}`
		return {
			error: {
				message,
				path: filePath,
				rawError: toError(error),
				source: "leanpkg",
				type: "invalid_config",
			},
			ok: false,
		}
	}

	const parsed = leanpkgSchema.safeParse(raw)
	if (!parsed.success) {
		return {
			error: {
				message: `invalid 'package.lean_version' in ${filePath}`,
				path: filePath,
				source: "leanpkg",
				type: "invalid_config",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: parsed.data.package?.lean_version ?? null }
}
