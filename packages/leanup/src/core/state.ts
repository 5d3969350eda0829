import type { Cfg } from "./config.js"
import { findOverride } from "./override/locator.js"
import type { OverrideReason } from "./override/reason.js"
import { resolveToolchainName } from "./resolve/resolver.js"
import { displayDescriptor } from "./toolchain/descriptor.js"
import { listToolchains, Toolchain } from "./toolchain/toolchain.js"
import type { Result } from "./types/errors.js"

export interface StateDump {
	version: string
	toolchains: {
		installed: { resolved_name: string; path: string }[]
		/** Null when no default toolchain is configured. */
		default: { unresolved: string; resolved: string | null } | null
		/** Null when no override applies to the directory. */
		active_override: { unresolved: string; reason: OverrideReason } | null
	}
}

/**
 * Machine-readable snapshot of installed toolchains, the default and the
 * override governing `dir`. A default that cannot be resolved right now is
 * reported with `resolved: null`.
 */
export async function buildStateDump(
	cfg: Cfg,
	dir: string,
	version: string,
): Promise<Result<StateDump>> {
	const installed = await listToolchains(cfg)
	if (!installed.ok) {
		return installed
	}

	const defaultName = await cfg.settings.with((settings) => settings.defaultToolchain)
	if (!defaultName.ok) {
		return defaultName
	}

	let defaultToolchain: StateDump["toolchains"]["default"] = null
	if (defaultName.value) {
		const resolved = await resolveToolchainName(cfg, defaultName.value, {
			allowCacheFallback: false,
			allowNetwork: true,
		})
		defaultToolchain = {
			resolved: resolved.ok ? displayDescriptor(resolved.value) : null,
			unresolved: defaultName.value,
		}
	}

	const override = await findOverride(cfg, dir)
	if (!override.ok) {
		return override
	}

	return {
		ok: true,
		value: {
			toolchains: {
				active_override: override.value
					? {
							reason: override.value.reason,
							unresolved: displayDescriptor(override.value.descriptor.unresolved),
						}
					: null,
				default: defaultToolchain,
				installed: installed.value.map((descriptor) => {
					const toolchain = new Toolchain(cfg, descriptor)
					return { path: toolchain.path, resolved_name: toolchain.name }
				}),
			},
			version,
		},
	}
}
