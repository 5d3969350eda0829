import type { Cfg } from "./config.js"
import { findOverride } from "./override/locator.js"
import { formatOverrideReason, type OverrideReason } from "./override/reason.js"
import { ONLINE_WITH_FALLBACK, resolveDescriptor } from "./resolve/resolver.js"
import {
	displayDescriptor,
	lookupUnresolvedDescriptor,
	type UnresolvedDescriptor,
} from "./toolchain/descriptor.js"
import { Toolchain } from "./toolchain/toolchain.js"
import { type Result, withContext } from "./types/errors.js"

export interface ActiveToolchain {
	toolchain: Toolchain
	/** Null when the default toolchain applies. */
	reason: OverrideReason | null
}

/**
 * Raw default toolchain name from settings.
 */
export async function getDefaultToolchain(cfg: Cfg): Promise<Result<string | null>> {
	return cfg.settings.with((settings) => settings.defaultToolchain ?? null)
}

/**
 * Make `name` the default toolchain, installing it if needed. The unresolved
 * name is stored so that channels keep tracking their latest release.
 */
export async function setDefaultToolchain(cfg: Cfg, name: string): Promise<Result<Toolchain>> {
	const unresolved = await lookupUnresolvedDescriptor(cfg.toolchainsDir, name)
	if (!unresolved.ok) {
		return unresolved
	}

	const toolchain = await ensureInstalled(cfg, unresolved.value, `default toolchain '${name}'`)
	if (!toolchain.ok) {
		return toolchain
	}

	const stored = displayDescriptor(unresolved.value.unresolved)
	const updated = await cfg.settings.withMut((settings) => {
		settings.defaultToolchain = stored
	})
	if (!updated.ok) {
		return updated
	}

	cfg.notify.onEvent({ toolchain: stored, type: "set_default_toolchain" })
	return toolchain
}

export async function clearDefaultToolchain(cfg: Cfg): Promise<Result<void>> {
	return cfg.settings.withMut((settings) => {
		settings.defaultToolchain = undefined
	})
}

/**
 * The toolchain that governs `dir`, installed on demand, or null when no
 * override applies and no default is configured.
 */
export async function findOverrideToolchainOrDefault(
	cfg: Cfg,
	dir: string,
): Promise<Result<ActiveToolchain | null>> {
	const override = await findOverride(cfg, dir)
	if (!override.ok) {
		return override
	}

	if (override.value) {
		const { descriptor, reason } = override.value
		const toolchain = await ensureInstalled(
			cfg,
			descriptor,
			`toolchain '${displayDescriptor(descriptor.unresolved)}' (${formatOverrideReason(reason)})`,
		)
		if (!toolchain.ok) {
			return toolchain
		}
		return { ok: true, value: { reason, toolchain: toolchain.value } }
	}

	const name = await getDefaultToolchain(cfg)
	if (!name.ok || name.value === null) {
		return name.ok ? { ok: true, value: null } : name
	}

	const unresolved = await lookupUnresolvedDescriptor(cfg.toolchainsDir, name.value)
	if (!unresolved.ok) {
		return unresolved
	}

	const toolchain = await ensureInstalled(
		cfg,
		unresolved.value,
		`default toolchain '${name.value}'`,
	)
	if (!toolchain.ok) {
		return toolchain
	}
	return { ok: true, value: { reason: null, toolchain: toolchain.value } }
}

export async function toolchainForDir(cfg: Cfg, dir: string): Promise<Result<ActiveToolchain>> {
	const active = await findOverrideToolchainOrDefault(cfg, dir)
	if (!active.ok) {
		return active
	}
	if (!active.value) {
		return {
			error: {
				message: "no default toolchain configured; run 'leanup default <toolchain>'",
				type: "no_default_toolchain",
			},
			ok: false,
		}
	}
	return { ok: true, value: active.value }
}

/**
 * Resolve an unresolved descriptor and make sure the toolchain is on disk.
 * Custom toolchains are never installed; they must already exist.
 */
export async function ensureInstalled(
	cfg: Cfg,
	unresolved: UnresolvedDescriptor,
	label: string,
): Promise<Result<Toolchain>> {
	const resolved = await resolveDescriptor(cfg, unresolved, ONLINE_WITH_FALLBACK)
	if (!resolved.ok) {
		return { error: withContext(resolved.error, `failed to resolve ${label}`), ok: false }
	}

	const toolchain = new Toolchain(cfg, resolved.value)
	if (toolchain.isCustom()) {
		if (await toolchain.exists()) {
			return { ok: true, value: toolchain }
		}
		return {
			error: {
				message: `${label} is not installed`,
				path: toolchain.path,
				target: toolchain.name,
				type: "not_installed",
			},
			ok: false,
		}
	}

	const installed = await toolchain.installIfNotInstalled()
	if (!installed.ok) {
		return { error: withContext(installed.error, `failed to install ${label}`), ok: false }
	}
	return { ok: true, value: toolchain }
}
