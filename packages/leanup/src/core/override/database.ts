import path from "node:path"
import type { Cfg } from "../config.js"
import { canonicalize, safeStat } from "../io/fs.js"
import { displayDescriptor, type ToolchainDescriptor } from "../toolchain/descriptor.js"
import type { Result } from "../types/errors.js"

export interface OverrideEntry {
	path: string
	toolchain: string
}

async function overrideKey(cfg: Cfg, dir: string): Promise<string> {
	const canonical = await canonicalize(dir)
	if (canonical === null) {
		cfg.notify.onEvent({ path: dir, type: "no_canonical_path" })
		return path.resolve(dir)
	}
	return canonical
}

export async function setOverride(
	cfg: Cfg,
	dir: string,
	descriptor: ToolchainDescriptor,
): Promise<Result<string>> {
	const key = await overrideKey(cfg, dir)
	const toolchain = displayDescriptor(descriptor)
	const updated = await cfg.settings.withMut((settings) => {
		settings.overrides[key] = toolchain
	})
	if (!updated.ok) {
		return updated
	}

	cfg.notify.onEvent({ path: key, toolchain, type: "set_override_toolchain" })
	return { ok: true, value: key }
}

/**
 * Remove the override for dir. Returns false when none was set.
 */
export async function removeOverride(cfg: Cfg, dir: string): Promise<Result<boolean>> {
	const key = await overrideKey(cfg, dir)
	const removed = await cfg.settings.withMut((settings) => {
		if (!(key in settings.overrides)) {
			return false
		}
		delete settings.overrides[key]
		return true
	})
	if (!removed.ok) {
		return removed
	}

	if (removed.value) {
		cfg.notify.onEvent({ path: key, type: "removed_override" })
	}
	return removed
}

/**
 * Drop overrides whose directory no longer exists. Returns the removed paths.
 */
export async function removeNonexistentOverrides(cfg: Cfg): Promise<Result<string[]>> {
	const overrides = await listOverrides(cfg)
	if (!overrides.ok) {
		return overrides
	}

	const missing: string[] = []
	for (const entry of overrides.value) {
		const stats = await safeStat(entry.path)
		if (!stats.ok) {
			return stats
		}
		if (!stats.value) {
			missing.push(entry.path)
		}
	}
	if (missing.length === 0) {
		return { ok: true, value: [] }
	}

	const updated = await cfg.settings.withMut((settings) => {
		for (const key of missing) {
			delete settings.overrides[key]
		}
	})
	if (!updated.ok) {
		return updated
	}

	for (const key of missing) {
		cfg.notify.onEvent({ path: key, type: "removed_override" })
	}
	return { ok: true, value: missing }
}

export async function listOverrides(cfg: Cfg): Promise<Result<OverrideEntry[]>> {
	return cfg.settings.with((settings) =>
		Object.entries(settings.overrides)
			.map(([dir, toolchain]) => ({ path: dir, toolchain }))
			.sort((a, b) => a.path.localeCompare(b.path)),
	)
}
