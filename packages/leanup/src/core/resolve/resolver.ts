import semver from "semver"
import type { Cfg } from "../config.js"
import {
	type Channel,
	isChannel,
	lookupUnresolvedDescriptor,
	PIN_FILE_RELEASE,
	type ToolchainDescriptor,
	type UnresolvedDescriptor,
} from "../toolchain/descriptor.js"
import { releaseVersion } from "../toolchain/sort.js"
import { listToolchains } from "../toolchain/toolchain.js"
import type { Result } from "../types/errors.js"
import { fetchLatestRelease } from "./releases.js"

/**
 * Upper bound on nested `lean-toolchain` indirections. The proxy recursion
 * guard uses the same limit.
 */
export const MAX_RECURSION_DEPTH = 20

export interface ResolveOptions {
	allowNetwork: boolean
	allowCacheFallback: boolean
}

export const ONLINE_WITH_FALLBACK: ResolveOptions = {
	allowCacheFallback: true,
	allowNetwork: true,
}

/**
 * Turn an unresolved descriptor into a concrete one: pin-file indirections are
 * followed, channels are looked up on the release host (falling back to the
 * newest matching installed release when allowed), and concrete tags pass
 * through without network access.
 */
export async function resolveDescriptor(
	cfg: Cfg,
	unresolved: UnresolvedDescriptor,
	options: ResolveOptions,
	depth = 0,
): Promise<Result<ToolchainDescriptor>> {
	const descriptor = unresolved.unresolved
	if (descriptor.kind === "local") {
		return { ok: true, value: descriptor }
	}

	const { origin, release } = descriptor
	if (release === PIN_FILE_RELEASE) {
		return resolvePinFile(cfg, origin, options, depth)
	}

	if (isChannel(release)) {
		return resolveChannel(cfg, origin, release, options)
	}

	return { ok: true, value: { kind: "remote", origin, release } }
}

/**
 * Parse a raw name and resolve it.
 */
export async function resolveToolchainName(
	cfg: Cfg,
	name: string,
	options: ResolveOptions,
): Promise<Result<ToolchainDescriptor>> {
	const unresolved = await lookupUnresolvedDescriptor(cfg.toolchainsDir, name)
	if (!unresolved.ok) {
		return unresolved
	}
	return resolveDescriptor(cfg, unresolved.value, options)
}

async function resolvePinFile(
	cfg: Cfg,
	origin: string,
	options: ResolveOptions,
	depth: number,
): Promise<Result<ToolchainDescriptor>> {
	if (depth >= MAX_RECURSION_DEPTH) {
		return {
			error: {
				message: `'${PIN_FILE_RELEASE}' of '${origin}' nests deeper than ${MAX_RECURSION_DEPTH} levels`,
				target: origin,
				type: "recursion_limit",
			},
			ok: false,
		}
	}

	const url = `https://raw.githubusercontent.com/${origin}/HEAD/${PIN_FILE_RELEASE}`
	if (!(options.allowNetwork && cfg.allowNetwork)) {
		return {
			error: {
				message: `cannot fetch '${url}' without network access`,
				type: "network",
				url,
			},
			ok: false,
		}
	}

	const body = await cfg.http.fetchText(url)
	if (!body.ok) {
		return {
			error: {
				cause: body.error,
				message: `failed to fetch the toolchain pinned by '${origin}'`,
				type: "network",
				url,
			},
			ok: false,
		}
	}

	const name = (body.value.split(/\r?\n/)[0] ?? "").trim()
	const next = await lookupUnresolvedDescriptor(cfg.toolchainsDir, name)
	if (!next.ok) {
		return next
	}

	const resolved = await resolveDescriptor(cfg, next.value, options, depth + 1)
	if (!resolved.ok || resolved.value.kind === "local") {
		return resolved
	}

	return {
		ok: true,
		value: { ...resolved.value, fromChannel: resolved.value.fromChannel ?? PIN_FILE_RELEASE },
	}
}

async function resolveChannel(
	cfg: Cfg,
	origin: string,
	channel: Channel,
	options: ResolveOptions,
): Promise<Result<ToolchainDescriptor>> {
	cfg.notify.onEvent({ channel, origin, type: "resolving_channel" })
	const latest = await fetchLatestRelease(
		cfg,
		origin,
		channel,
		options.allowNetwork && cfg.allowNetwork,
	)
	if (latest.ok) {
		cfg.notify.onEvent({ channel, release: latest.value, type: "resolved_channel" })
		return {
			ok: true,
			value: { fromChannel: channel, kind: "remote", origin, release: latest.value },
		}
	}

	if (latest.error.type === "unsupported_channel" || !options.allowCacheFallback) {
		return latest
	}

	const cached = await newestInstalledRelease(cfg, origin, channel)
	if (!cached.ok) {
		return cached
	}
	if (cached.value === null) {
		return latest
	}

	const value: ToolchainDescriptor = {
		fromChannel: channel,
		kind: "remote",
		origin,
		release: cached.value,
	}
	cfg.notify.onEvent({ toolchain: `${origin}:${cached.value}`, type: "using_existing_release" })
	return { ok: true, value }
}

/**
 * Highest installed release of `origin` that belongs to `channel`:
 * the greatest `nightly-*` tag for nightly, otherwise the greatest
 * semantic version (pre-releases only outside the stable channel).
 */
export async function newestInstalledRelease(
	cfg: Cfg,
	origin: string,
	channel: Channel,
): Promise<Result<string | null>> {
	const installed = await listToolchains(cfg)
	if (!installed.ok) {
		return installed
	}

	const releases = installed.value.flatMap((descriptor) =>
		descriptor.kind === "remote" && descriptor.origin === origin ? [descriptor.release] : [],
	)

	if (channel === "nightly") {
		const nightlies = releases.filter((release) => release.startsWith("nightly-")).sort()
		return { ok: true, value: nightlies.at(-1) ?? null }
	}

	let best: { release: string; version: semver.SemVer } | null = null
	for (const release of releases) {
		const version = releaseVersion(release)
		if (!version) continue
		if (channel === "stable" && version.prerelease.length > 0) continue
		if (!best || semver.gt(version, best.version)) {
			best = { release, version }
		}
	}

	return { ok: true, value: best?.release ?? null }
}
