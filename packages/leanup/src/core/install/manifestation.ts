import { randomUUID } from "node:crypto"
import path from "node:path"
import type { Cfg } from "../config.js"
import { ensureDir, removePath, renamePath, safeLstat, safeStat } from "../io/fs.js"
import { displayDescriptor, type RemoteDescriptor } from "../toolchain/descriptor.js"
import { type Result, withContext } from "../types/errors.js"
import { findReleaseAsset } from "./assets.js"
import { extractArchive } from "./extract.js"
import { acquireFileLock } from "./lock.js"
import { platformAssetName } from "./platform.js"

export const LOCK_SUFFIX = ".lock"
export const STAGING_SUFFIX = ".tmp"

/**
 * Download and unpack a release into installRoot. Succeeds without doing
 * anything when installRoot already exists. Concurrent callers for the same
 * root (in this or other processes) are serialized through a lock file, and
 * the root only appears through a final rename of the staging directory.
 */
export async function installToolchainDist(
	cfg: Cfg,
	descriptor: RemoteDescriptor,
	installRoot: string,
): Promise<Result<void>> {
	const existing = await isInstalled(installRoot)
	if (!existing.ok || existing.value) {
		return existing.ok ? { ok: true, value: undefined } : existing
	}

	const parent = await ensureDir(path.dirname(installRoot))
	if (!parent.ok) {
		return parent
	}

	const lock = await acquireFileLock(cfg, `${installRoot}${LOCK_SUFFIX}`)
	if (!lock.ok) {
		return lock
	}

	let result: Result<void>
	try {
		result = await installLocked(cfg, descriptor, installRoot)
	} finally {
		const released = await lock.value.release()
		if (!released.ok) {
			result = { error: released.error, ok: false }
		}
	}

	return result
}

async function installLocked(
	cfg: Cfg,
	descriptor: RemoteDescriptor,
	installRoot: string,
): Promise<Result<void>> {
	// Another installer may have finished while we waited for the lock
	const existing = await isInstalled(installRoot)
	if (!existing.ok || existing.value) {
		return existing.ok ? { ok: true, value: undefined } : existing
	}

	const target = displayDescriptor(descriptor)
	const asset = await findReleaseAsset(cfg, descriptor)
	if (!asset.ok) {
		return {
			error: withContext(asset.error, `failed to find a release asset for '${target}'`),
			ok: false,
		}
	}

	const platform = platformAssetName(cfg.platform, target)
	cfg.notify.onEvent({
		platform: platform.ok ? platform.value : cfg.platform.os,
		toolchain: target,
		type: "installing_component",
	})

	const tempDir = await ensureDir(cfg.tempDir)
	if (!tempDir.ok) {
		return tempDir
	}

	const archivePath = path.join(cfg.tempDir, `${randomUUID()}-${asset.value.name}`)
	let result: Result<void>
	try {
		result = await downloadAndUnpack(cfg, asset.value, archivePath, installRoot)
	} finally {
		const removed = await removePath(archivePath)
		if (!removed.ok) {
			result = removed
		}
	}

	return result
}

async function downloadAndUnpack(
	cfg: Cfg,
	asset: { name: string; url: string },
	archivePath: string,
	installRoot: string,
): Promise<Result<void>> {
	cfg.notify.onEvent({ type: "downloading_component", url: asset.url })
	const downloaded = await cfg.http.download(asset.url, archivePath, (event) => {
		if (event.type === "content_length") {
			cfg.notify.onEvent({ bytes: event.bytes, type: "download_content_length" })
		} else {
			cfg.notify.onEvent({ bytes: event.bytes, type: "download_data_received" })
		}
	})
	cfg.notify.onEvent({ type: "download_finished" })
	if (!downloaded.ok) {
		return {
			error: withContext(downloaded.error, `failed to download '${asset.url}'`),
			ok: false,
		}
	}

	const staging = `${installRoot}${STAGING_SUFFIX}`
	const leftover = await safeLstat(staging)
	if (!leftover.ok) {
		return leftover
	}
	if (leftover.value !== null) {
		cfg.notify.onEvent({ path: staging, type: "removing_directory" })
		const cleared = await removePath(staging)
		if (!cleared.ok) {
			return cleared
		}
	}

	cfg.notify.onEvent({ archive: archivePath, destination: staging, type: "extracting" })
	const extracted = await extractArchive(archivePath, staging, asset.name)
	if (!extracted.ok) {
		const removed = await removePath(staging)
		if (!removed.ok) {
			return { error: { ...removed.error, cause: extracted.error }, ok: false }
		}
		return extracted
	}

	return renamePath(staging, installRoot)
}

/**
 * Remove an installed toolchain directory (or link). Not lock-protected.
 */
export async function uninstallToolchainDir(installRoot: string): Promise<Result<void>> {
	const stats = await safeLstat(installRoot)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return {
			error: {
				message: `toolchain is not installed: '${installRoot}'`,
				path: installRoot,
				type: "not_installed",
			},
			ok: false,
		}
	}

	return removePath(installRoot)
}

async function isInstalled(installRoot: string): Promise<Result<boolean>> {
	const stats = await safeStat(installRoot)
	if (!stats.ok) {
		return stats
	}
	return { ok: true, value: stats.value?.isDirectory() ?? false }
}
