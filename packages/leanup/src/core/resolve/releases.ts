import { z } from "zod"
import { toError } from "../../utils/errors.js"
import type { Cfg } from "../config.js"
import { isDefaultOrigin } from "../install/assets.js"
import type { Channel } from "../toolchain/descriptor.js"
import type {
	InvalidConfigError,
	NetworkError,
	Result,
	UnsupportedChannelError,
} from "../types/errors.js"

export const RELEASE_FEED_URL = "https://release.lean-lang.org/"

export type ChannelQueryError = InvalidConfigError | NetworkError | UnsupportedChannelError

const releaseList = z.array(z.object({ name: z.string().min(1) })).default([])

const feedSchema = z.object({
	beta: releaseList,
	nightly: releaseList,
	stable: releaseList,
})

const LATEST_TAG_PATTERN = /\/tag\/([-a-z0-9.]+)/

/**
 * Latest release tag of `channel` for `origin`. The default origin has a
 * structured feed; other origins only expose their latest GitHub release.
 */
export async function fetchLatestRelease(
	cfg: Cfg,
	origin: string,
	channel: Channel,
	allowNetwork: boolean,
): Promise<Result<string, ChannelQueryError>> {
	if (!isDefaultOrigin(origin) && channel === "beta") {
		return {
			error: {
				channel,
				message: `channel 'beta' is not supported for custom origin '${origin}'`,
				origin,
				type: "unsupported_channel",
			},
			ok: false,
		}
	}

	if (!allowNetwork) {
		return {
			error: {
				message: `cannot resolve channel '${channel}' of '${origin}' without network access`,
				type: "network",
			},
			ok: false,
		}
	}

	return isDefaultOrigin(origin)
		? fetchLatestReleaseJson(cfg, channel)
		: fetchLatestReleaseTag(cfg, origin)
}

export async function fetchLatestReleaseJson(
	cfg: Cfg,
	channel: Channel,
): Promise<Result<string, InvalidConfigError | NetworkError>> {
	const body = await cfg.http.fetchText(RELEASE_FEED_URL)
	if (!body.ok) {
		return body
	}

	let raw: unknown
	try {
		raw = JSON.parse(body.value)
	} catch (error) {
		return {
			error: {
				message: "Release feed is not valid JSON.",
				path: RELEASE_FEED_URL,
				rawError: toError(error),
				source: "release_feed",
				type: "invalid_config",
			},
			ok: false,
		}
	}

	const parsed = feedSchema.safeParse(raw)
	if (!parsed.success) {
		return {
			error: {
				message: "Release feed has an unexpected shape.",
				path: RELEASE_FEED_URL,
				source: "release_feed",
				type: "invalid_config",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const latest = parsed.data[channel][0]
	if (!latest) {
		return {
			error: {
				message: `no releases found for channel '${channel}'`,
				type: "network",
				url: RELEASE_FEED_URL,
			},
			ok: false,
		}
	}

	return { ok: true, value: latest.name }
}

export async function fetchLatestReleaseTag(
	cfg: Cfg,
	origin: string,
): Promise<Result<string, NetworkError>> {
	const url = `https://github.com/${origin}/releases/latest`
	const page = await cfg.http.fetchText(url)
	if (!page.ok) {
		return page
	}

	const tag = LATEST_TAG_PATTERN.exec(page.value)?.[1]
	if (!tag) {
		return {
			error: { message: `failed to parse latest release tag of '${origin}'`, type: "network", url },
			ok: false,
		}
	}

	return { ok: true, value: tag }
}
