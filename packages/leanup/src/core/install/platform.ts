import type { PlatformInfo } from "../config.js"
import type { AssetNotFoundError, Result } from "../types/errors.js"

/**
 * Substring that release assets for this OS/architecture carry, e.g.
 * `linux`, `darwin_aarch64`, `windows`.
 */
export function platformAssetName(
	platform: PlatformInfo,
	target: string,
): Result<string, AssetNotFoundError> {
	const os = osName(platform.os)
	if (!os) {
		return {
			error: {
				message: `binary package was not provided for '${platform.os}'`,
				platform: platform.os,
				target,
				type: "asset_not_found",
			},
			ok: false,
		}
	}

	return { ok: true, value: `${os}${archSuffix(platform.arch)}` }
}

function osName(os: NodeJS.Platform): string | null {
	switch (os) {
		case "win32":
			return "windows"
		case "linux":
			return "linux"
		case "darwin":
			return "darwin"
		default:
			return null
	}
}

function archSuffix(arch: string): string {
	switch (arch) {
		case "x64":
			return ""
		case "arm64":
			return "_aarch64"
		default:
			return `_${arch}`
	}
}

export function exeSuffix(platform: PlatformInfo): string {
	return platform.os === "win32" ? ".exe" : ""
}
