import path from "node:path"
import type { HttpClient } from "../utils/http.js"
import { type NotificationSink, silentSink } from "./notifications.js"
import { SettingsFile } from "./settings/file.js"
import type { AbsolutePath } from "./types/branded.js"
import { toAbsolutePath } from "./types/coerce.js"

export interface PlatformInfo {
	os: NodeJS.Platform
	arch: string
}

/**
 * Per-invocation session. Built once by the CLI (or a test) and threaded
 * through every core operation.
 */
export interface Cfg {
	homeDir: AbsolutePath
	toolchainsDir: AbsolutePath
	tempDir: AbsolutePath
	knownProjectsFile: AbsolutePath
	settings: SettingsFile
	/** Toolchain name from the environment override, if set. */
	envOverride?: string
	/** When false, channel queries fail immediately as if offline. */
	allowNetwork: boolean
	http: HttpClient
	notify: NotificationSink
	platform: PlatformInfo
	lockPollIntervalMs: number
}

export interface CfgOptions {
	homeDir: string
	http: HttpClient
	envOverride?: string
	offline?: boolean
	notify?: NotificationSink
	platform?: PlatformInfo
	lockPollIntervalMs?: number
}

export const DEFAULT_LOCK_POLL_INTERVAL_MS = 1000

export function createCfg(options: CfgOptions): Cfg {
	const homeDir = toAbsolutePath(options.homeDir)
	return {
		allowNetwork: !options.offline,
		envOverride: options.envOverride,
		homeDir,
		http: options.http,
		knownProjectsFile: toAbsolutePath(homeDir, "known-projects"),
		lockPollIntervalMs: options.lockPollIntervalMs ?? DEFAULT_LOCK_POLL_INTERVAL_MS,
		notify: options.notify ?? silentSink,
		platform: options.platform ?? { arch: process.arch, os: process.platform },
		settings: new SettingsFile(path.join(homeDir, "settings.toml")),
		tempDir: toAbsolutePath(homeDir, "tmp"),
		toolchainsDir: toAbsolutePath(homeDir, "toolchains"),
	}
}
