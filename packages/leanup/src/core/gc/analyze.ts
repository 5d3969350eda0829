import path from "node:path"
import { TOOLCHAIN_ENV } from "../../env.js"
import type { Cfg } from "../config.js"
import { readTextFileIfExists } from "../io/fs.js"
import { PIN_FILE } from "../override/locator.js"
import { readProjectRoots } from "../override/projects.js"
import { ONLINE_WITH_FALLBACK, resolveDescriptor, resolveToolchainName } from "../resolve/resolver.js"
import {
	displayDescriptor,
	lookupUnresolvedDescriptor,
	parseResolvedDescriptor,
	type ToolchainDescriptor,
} from "../toolchain/descriptor.js"
import { listToolchains, Toolchain } from "../toolchain/toolchain.js"
import type { Result } from "../types/errors.js"

export type UsedToolchain = [label: string, descriptor: ToolchainDescriptor]

export interface GcAnalysis {
	unused: Toolchain[]
	used: UsedToolchain[]
}

/**
 * Classify installed toolchains as used or unused. Used means referenced by a
 * known project's pin file, the default, the environment override or an
 * override database entry. Custom toolchains are never reported as unused.
 * Nothing is deleted here.
 */
export async function analyzeToolchains(cfg: Cfg): Promise<Result<GcAnalysis>> {
	const used = await usedToolchains(cfg)
	if (!used.ok) {
		return used
	}

	const installed = await listToolchains(cfg)
	if (!installed.ok) {
		return installed
	}

	const usedNames = new Set(used.value.map(([, descriptor]) => displayDescriptor(descriptor)))
	const unused = installed.value
		.map((descriptor) => new Toolchain(cfg, descriptor))
		.filter((toolchain) => !toolchain.isCustom() && !usedNames.has(toolchain.name))

	return { ok: true, value: { unused, used: used.value } }
}

async function usedToolchains(cfg: Cfg): Promise<Result<UsedToolchain[]>> {
	const used: UsedToolchain[] = []

	const roots = await readProjectRoots(cfg)
	if (!roots.ok) {
		return roots
	}
	for (const root of roots.value) {
		const descriptor = await resolveProjectRoot(cfg, root)
		if (descriptor) {
			used.push([root, descriptor])
		}
	}

	const defaultName = await cfg.settings.with((settings) => settings.defaultToolchain)
	if (!defaultName.ok) {
		return defaultName
	}
	if (defaultName.value) {
		const resolved = await resolveReferenced(cfg, "default toolchain", defaultName.value)
		if (resolved) {
			used.push(["default toolchain", resolved])
		}
	}

	if (cfg.envOverride) {
		const resolved = await resolveReferenced(cfg, TOOLCHAIN_ENV, cfg.envOverride)
		if (resolved) {
			used.push([TOOLCHAIN_ENV, resolved])
		}
	}

	const overrides = await cfg.settings.with((settings) => Object.entries(settings.overrides))
	if (!overrides.ok) {
		return overrides
	}
	for (const [dir, toolchain] of overrides.value) {
		used.push([`${dir} (override)`, parseResolvedDescriptor(toolchain)])
	}

	return { ok: true, value: used }
}

/**
 * Resolve a toolchain named by the default or the environment. One that does
 * not resolve is left out with a warning rather than failing the analysis.
 */
async function resolveReferenced(
	cfg: Cfg,
	label: string,
	name: string,
): Promise<ToolchainDescriptor | undefined> {
	const resolved = await resolveToolchainName(cfg, name, ONLINE_WITH_FALLBACK)
	if (!resolved.ok) {
		cfg.notify.onEvent({
			label,
			reason: resolved.error.message,
			toolchain: name,
			type: "unresolved_toolchain",
		})
		return undefined
	}
	return resolved.value
}

/**
 * Toolchain pinned by a known project root, or undefined when the pin file
 * is gone or no longer resolves.
 */
async function resolveProjectRoot(
	cfg: Cfg,
	root: string,
): Promise<ToolchainDescriptor | undefined> {
	const pin = await readTextFileIfExists(path.join(root, PIN_FILE))
	if (!pin.ok || pin.value === null) {
		return undefined
	}

	const name = (pin.value.split(/\r?\n/)[0] ?? "").trim()
	const unresolved = await lookupUnresolvedDescriptor(cfg.toolchainsDir, name)
	if (!unresolved.ok) {
		return undefined
	}

	const resolved = await resolveDescriptor(cfg, unresolved.value, ONLINE_WITH_FALLBACK)
	return resolved.ok ? resolved.value : undefined
}
