import { z } from "zod"
import { toError } from "../../utils/errors.js"
import type { Cfg } from "../config.js"
import {
	DEFAULT_ORIGIN,
	displayDescriptor,
	type RemoteDescriptor,
} from "../toolchain/descriptor.js"
import type {
	AssetNotFoundError,
	InvalidConfigError,
	NetworkError,
	Result,
} from "../types/errors.js"
import { archiveFormat, type ArchiveFormat } from "./extract.js"
import { platformAssetName } from "./platform.js"

export interface ReleaseAsset {
	name: string
	url: string
}

export type AssetLookupError = AssetNotFoundError | InvalidConfigError | NetworkError

const FORMAT_PREFERENCE: ArchiveFormat[] = ["tar.zst", "tar.gz", "zip"]

const releaseSchema = z.object({
	assets: z.array(
		z.object({
			browser_download_url: z.string().url(),
			name: z.string(),
		}),
	),
})

export function isDefaultOrigin(origin: string): boolean {
	return origin === DEFAULT_ORIGIN || origin === `${DEFAULT_ORIGIN}-nightly`
}

/**
 * Locate the downloadable archive of a release for the current platform.
 */
export async function findReleaseAsset(
	cfg: Cfg,
	descriptor: RemoteDescriptor,
): Promise<Result<ReleaseAsset, AssetLookupError>> {
	const target = displayDescriptor(descriptor)
	const platform = platformAssetName(cfg.platform, target)
	if (!platform.ok) {
		return platform
	}

	const assets = isDefaultOrigin(descriptor.origin)
		? await listAssetsFromApi(cfg, descriptor)
		: await listAssetsFromReleasePage(cfg, descriptor)
	if (!assets.ok) {
		return assets
	}

	const needle = `-${platform.value}.`
	const candidates = assets.value.filter((asset) => asset.name.includes(needle))
	const [first] = candidates
	if (!first) {
		return {
			error: {
				message: `binary package was not provided for '${platform.value}'`,
				platform: platform.value,
				target,
				type: "asset_not_found",
			},
			ok: false,
		}
	}

	for (const format of FORMAT_PREFERENCE) {
		const preferred = candidates.find((asset) => archiveFormat(asset.name) === format)
		if (preferred) {
			return { ok: true, value: preferred }
		}
	}

	return { ok: true, value: first }
}

async function listAssetsFromApi(
	cfg: Cfg,
	descriptor: RemoteDescriptor,
): Promise<Result<ReleaseAsset[], InvalidConfigError | NetworkError>> {
	const url = `https://api.github.com/repos/${descriptor.origin}/releases/tags/${descriptor.release}`
	const body = await cfg.http.fetchText(url)
	if (!body.ok) {
		return body
	}

	let raw: unknown
	try {
		raw = JSON.parse(body.value)
	} catch (error) {
		return feedFailure(`Release data at ${url} is not valid JSON.`, url, {
			rawError: toError(error),
		})
	}

	const parsed = releaseSchema.safeParse(raw)
	if (!parsed.success) {
		return feedFailure(`Release data at ${url} has an unexpected shape.`, url, {
			zodError: parsed.error,
		})
	}

	return {
		ok: true,
		value: parsed.data.assets.map((asset) => ({
			name: asset.name,
			url: asset.browser_download_url,
		})),
	}
}

async function listAssetsFromReleasePage(
	cfg: Cfg,
	descriptor: RemoteDescriptor,
): Promise<Result<ReleaseAsset[], NetworkError>> {
	const url = `https://github.com/${descriptor.origin}/releases/expanded_assets/${descriptor.release}`
	const page = await cfg.http.fetchText(url)
	if (!page.ok) {
		return page
	}

	const pattern = new RegExp(`/${escapeRegExp(descriptor.origin)}/releases/download/[^"]+`, "g")
	const assets: ReleaseAsset[] = []
	for (const match of page.value.matchAll(pattern)) {
		const href = match[0]
		const name = href.slice(href.lastIndexOf("/") + 1)
		assets.push({ name, url: `https://github.com${href}` })
	}

	return { ok: true, value: assets }
}

function feedFailure<T>(
	message: string,
	url: string,
	extra: Pick<InvalidConfigError, "rawError" | "zodError">,
): Result<T, InvalidConfigError> {
	return {
		error: { ...extra, message, path: url, source: "release_feed", type: "invalid_config" },
		ok: false,
	}
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}
