import path from "node:path"
import type { Cfg } from "../config.js"
import { canonicalize, readRegularFileIfExists } from "../io/fs.js"
import {
	decodeToolchainDir,
	lookupUnresolvedDescriptor,
	parseResolvedDescriptor,
	type UnresolvedDescriptor,
} from "../toolchain/descriptor.js"
import { coerceNonEmpty } from "../types/coerce.js"
import type { InvalidConfigError, Result } from "../types/errors.js"
import { LEANPKG_FILE, readLeanpkgVersion } from "./leanpkg.js"
import { addProjectRoot } from "./projects.js"
import type { OverrideReason } from "./reason.js"

export const PIN_FILE = "lean-toolchain"

export interface OverrideMatch {
	descriptor: UnresolvedDescriptor
	reason: OverrideReason
}

/**
 * Which toolchain governs `startDir`, without resolving or installing it.
 *
 * The environment override wins outright. Otherwise each directory from
 * startDir up to the filesystem root is checked for, in order, an override
 * database entry, a pin file and a leanpkg.toml `lean_version`; the first
 * hit wins, so a nearer pin file beats a farther database entry. Inside a
 * toolchain's own install directory that toolchain governs itself.
 */
export async function findOverride(
	cfg: Cfg,
	startDir: string,
): Promise<Result<OverrideMatch | null>> {
	if (cfg.envOverride) {
		const descriptor = await lookupUnresolvedDescriptor(cfg.toolchainsDir, cfg.envOverride)
		if (!descriptor.ok) {
			return descriptor
		}
		return {
			ok: true,
			value: { descriptor: descriptor.value, reason: { kind: "environment" } },
		}
	}

	const overrides = await cfg.settings.with((settings) => ({ ...settings.overrides }))
	if (!overrides.ok) {
		return overrides
	}

	const toolchainsDir = (await canonicalize(cfg.toolchainsDir)) ?? cfg.toolchainsDir
	let dir = await canonicalize(startDir)
	if (dir === null) {
		cfg.notify.onEvent({ path: startDir, type: "no_canonical_path" })
		dir = path.resolve(startDir)
	}

	while (true) {
		const found = await overrideInDir(cfg, dir, overrides.value)
		if (!found.ok || found.value) {
			return found
		}

		const parent = path.dirname(dir)
		if (parent === dir) {
			return { ok: true, value: null }
		}

		if (parent === toolchainsDir) {
			return {
				ok: true,
				value: {
					descriptor: { unresolved: decodeToolchainDir(path.basename(dir)) },
					reason: { kind: "inside_toolchain", path: dir },
				},
			}
		}

		dir = parent
	}
}

async function overrideInDir(
	cfg: Cfg,
	dir: string,
	overrides: Record<string, string>,
): Promise<Result<OverrideMatch | null>> {
	const entry = overrides[dir]
	if (entry !== undefined) {
		return {
			ok: true,
			value: {
				descriptor: { unresolved: parseResolvedDescriptor(entry) },
				reason: { kind: "override_db", path: dir },
			},
		}
	}

	const pinPath = path.join(dir, PIN_FILE)
	const pin = await readRegularFileIfExists(pinPath)
	if (!pin.ok) {
		return pin
	}
	if (pin.value !== null) {
		const firstLine = pin.value.split(/\r?\n/)[0] ?? ""
		const descriptor = await parseOverrideName(cfg, firstLine, pinPath, "pin_file")
		if (!descriptor.ok) {
			return descriptor
		}

		const recorded = await addProjectRoot(cfg, dir)
		if (!recorded.ok) {
			return recorded
		}

		return {
			ok: true,
			value: {
				descriptor: descriptor.value,
				reason: { kind: "toolchain_file", path: pinPath },
			},
		}
	}

	const leanpkgPath = path.join(dir, LEANPKG_FILE)
	const version = await readLeanpkgVersion(leanpkgPath)
	if (!version.ok) {
		return version
	}
	if (version.value !== null) {
		const descriptor = await parseOverrideName(cfg, version.value, leanpkgPath, "leanpkg")
		if (!descriptor.ok) {
			return descriptor
		}
		return {
			ok: true,
			value: {
				descriptor: descriptor.value,
				reason: { kind: "leanpkg_file", path: leanpkgPath },
			},
		}
	}

	return { ok: true, value: null }
}

async function parseOverrideName(
	cfg: Cfg,
	raw: string,
	filePath: string,
	source: InvalidConfigError["source"],
): Promise<Result<UnresolvedDescriptor, InvalidConfigError>> {
	const name = coerceNonEmpty(raw)
	if (name === null) {
		return {
			error: {
				message: `empty toolchain name in '${filePath}'`,
				path: filePath,
				source,
				type: "invalid_config",
			},
			ok: false,
		}
	}

	const descriptor = await lookupUnresolvedDescriptor(cfg.toolchainsDir, name)
	if (!descriptor.ok) {
		return {
			error: {
				cause: descriptor.error,
				message: `invalid toolchain name in '${filePath}'`,
				path: filePath,
				source,
				type: "invalid_config",
			},
			ok: false,
		}
	}

	return descriptor
}
