import path from "node:path"
import { ensureDir, readTextFileIfExists, writeTextFile } from "../io/fs.js"
import type { InvalidConfigError, IoError, Result } from "../types/errors.js"
import { defaultSettings, parseSettings, type Settings, serializeSettings } from "./settings.js"

export type SettingsError = InvalidConfigError | IoError

/**
 * Scoped access to `settings.toml`. Reads are cached for the lifetime of the
 * object; writes go straight to disk with no cross-process locking.
 */
export class SettingsFile {
	private cache: Settings | null = null

	constructor(readonly path: string) {}

	async with<T>(fn: (settings: Readonly<Settings>) => T): Promise<Result<T, SettingsError>> {
		const loaded = await this.load()
		if (!loaded.ok) {
			return loaded
		}

		return { ok: true, value: fn(loaded.value) }
	}

	async withMut<T>(fn: (settings: Settings) => T): Promise<Result<T, SettingsError>> {
		const loaded = await this.load()
		if (!loaded.ok) {
			return loaded
		}

		const draft: Settings = {
			...loaded.value,
			overrides: { ...loaded.value.overrides },
		}
		const value = fn(draft)

		const written = await this.write(draft)
		if (!written.ok) {
			return written
		}

		return { ok: true, value }
	}

	private async load(): Promise<Result<Settings, SettingsError>> {
		if (this.cache) {
			return { ok: true, value: this.cache }
		}

		const contents = await readTextFileIfExists(this.path)
		if (!contents.ok) {
			return contents
		}

		if (contents.value === null) {
			const defaults = defaultSettings()
			const written = await this.write(defaults)
			if (!written.ok) {
				return written
			}
			return { ok: true, value: defaults }
		}

		const parsed = parseSettings(contents.value, this.path)
		if (!parsed.ok) {
			return parsed
		}

		this.cache = parsed.value
		return parsed
	}

	private async write(settings: Settings): Promise<Result<void, SettingsError>> {
		const dir = await ensureDir(path.dirname(this.path))
		if (!dir.ok) {
			return dir
		}

		const written = await writeTextFile(this.path, serializeSettings(settings))
		if (!written.ok) {
			return written
		}

		this.cache = settings
		return { ok: true, value: undefined }
	}
}
