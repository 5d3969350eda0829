import { cp, symlink } from "node:fs/promises"
import path from "node:path"
import type { Cfg } from "../config.js"
import {
	installToolchainDist,
	LOCK_SUFFIX,
	STAGING_SUFFIX,
	uninstallToolchainDir,
} from "../install/manifestation.js"
import { exeSuffix } from "../install/platform.js"
import { ensureDir, listDir, safeLstat, safeStat } from "../io/fs.js"
import { ioFailure, type IoResult } from "../io/types.js"
import type { AbsolutePath } from "../types/branded.js"
import { toAbsolutePath } from "../types/coerce.js"
import type { Result } from "../types/errors.js"
import {
	decodeToolchainDir,
	displayDescriptor,
	type ToolchainDescriptor,
	toolchainDirName,
} from "./descriptor.js"
import { sortToolchains } from "./sort.js"

/**
 * Handle on one toolchain's install prefix. Existence is probed on every call;
 * nothing about the install state is cached.
 */
export class Toolchain {
	readonly path: AbsolutePath

	constructor(
		private readonly cfg: Cfg,
		readonly descriptor: ToolchainDescriptor,
	) {
		this.path = toAbsolutePath(cfg.toolchainsDir, toolchainDirName(descriptor))
	}

	get name(): string {
		return displayDescriptor(this.descriptor)
	}

	async exists(): Promise<boolean> {
		const stats = await safeLstat(this.path)
		if (!stats.ok || !stats.value) {
			return false
		}
		if (stats.value.isSymbolicLink()) {
			const target = await safeStat(this.path)
			return target.ok && (target.value?.isDirectory() ?? false)
		}
		return stats.value.isDirectory()
	}

	/**
	 * Linked or copied toolchains are custom: they cannot be reinstalled from a release.
	 */
	isCustom(): boolean {
		return this.descriptor.kind === "local"
	}

	async isLinked(): Promise<boolean> {
		const stats = await safeLstat(this.path)
		return stats.ok && (stats.value?.isSymbolicLink() ?? false)
	}

	async install(): Promise<Result<void>> {
		if (await this.exists()) {
			return {
				error: {
					message: `toolchain '${this.name}' is already installed`,
					path: this.path,
					target: this.name,
					type: "already_installed",
				},
				ok: false,
			}
		}

		const descriptor = this.descriptor
		if (descriptor.kind === "local") {
			return {
				error: {
					message: `toolchain '${this.name}' is a custom toolchain and cannot be installed from a release`,
					path: this.path,
					target: this.name,
					type: "not_installed",
				},
				ok: false,
			}
		}

		this.cfg.notify.onEvent({ toolchain: this.name, type: "installing_toolchain" })
		const installed = await installToolchainDist(this.cfg, descriptor, this.path)
		if (!installed.ok) {
			return installed
		}

		this.cfg.notify.onEvent({ toolchain: this.name, type: "installed_toolchain" })
		return installed
	}

	async installIfNotInstalled(): Promise<Result<void>> {
		this.cfg.notify.onEvent({ toolchain: this.name, type: "looking_for_toolchain" })
		if (await this.exists()) {
			this.cfg.notify.onEvent({ toolchain: this.name, type: "using_existing_toolchain" })
			return { ok: true, value: undefined }
		}

		return this.install()
	}

	/**
	 * Install from a local build directory, either by symlinking it or by copying it.
	 */
	async installFromDir(source: string, options: { link: boolean }): Promise<Result<void>> {
		const sourceDir = toAbsolutePath(source)
		const lean = path.join(sourceDir, "bin", `lean${exeSuffix(this.cfg.platform)}`)
		const leanStats = await safeStat(lean)
		if (!leanStats.ok) {
			return leanStats
		}
		if (!leanStats.value?.isFile()) {
			return {
				error: {
					message: `invalid toolchain path: '${sourceDir}' does not contain bin/lean`,
					path: lean,
					target: this.name,
					type: "binary_not_found",
				},
				ok: false,
			}
		}

		if (await this.exists()) {
			const removed = await this.remove()
			if (!removed.ok) {
				return removed
			}
		}

		const parent = await ensureDir(this.cfg.toolchainsDir)
		if (!parent.ok) {
			return parent
		}

		if (options.link) {
			this.cfg.notify.onEvent({ destination: this.path, source: sourceDir, type: "linking_directory" })
			return linkDir(sourceDir, this.path, this.cfg.platform.os === "win32")
		}

		this.cfg.notify.onEvent({ destination: this.path, source: sourceDir, type: "copying_directory" })
		return copyDir(sourceDir, this.path)
	}

	/**
	 * Remove the toolchain; an absent toolchain only produces a notification.
	 */
	async remove(): Promise<Result<void>> {
		const present = await safeLstat(this.path)
		if (!present.ok) {
			return present
		}
		if (!present.value) {
			this.cfg.notify.onEvent({ toolchain: this.name, type: "toolchain_not_installed" })
			return { ok: true, value: undefined }
		}

		this.cfg.notify.onEvent({ toolchain: this.name, type: "uninstalling_toolchain" })
		const removed = await uninstallToolchainDir(this.path)
		if (!removed.ok) {
			return removed
		}

		this.cfg.notify.onEvent({ toolchain: this.name, type: "uninstalled_toolchain" })
		return removed
	}

	binaryFile(name: string): string {
		const suffix = exeSuffix(this.cfg.platform)
		const file = suffix && !name.endsWith(suffix) ? `${name}${suffix}` : name
		return path.join(this.path, "bin", file)
	}
}

async function linkDir(source: string, destination: string, junction: boolean): Promise<IoResult<void>> {
	try {
		await symlink(source, destination, junction ? "junction" : "dir")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, destination, "link")
	}
}

async function copyDir(source: string, destination: string): Promise<IoResult<void>> {
	try {
		await cp(source, destination, { recursive: true, verbatimSymlinks: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, destination, "copy")
	}
}

/**
 * Every installed toolchain (directories and links in the toolchains dir),
 * sorted by version where releases parse as versions.
 */
export async function listToolchains(cfg: Cfg): Promise<IoResult<ToolchainDescriptor[]>> {
	const entries = await listDir(cfg.toolchainsDir)
	if (!entries.ok) {
		return entries
	}

	const descriptors: ToolchainDescriptor[] = []
	for (const entry of entries.value) {
		if (entry.endsWith(STAGING_SUFFIX) || entry.endsWith(LOCK_SUFFIX)) {
			continue
		}

		const stats = await safeLstat(path.join(cfg.toolchainsDir, entry))
		if (!stats.ok) {
			return stats
		}
		if (stats.value && (stats.value.isDirectory() || stats.value.isSymbolicLink())) {
			descriptors.push(decodeToolchainDir(entry))
		}
	}

	return { ok: true, value: sortToolchains(descriptors) }
}
