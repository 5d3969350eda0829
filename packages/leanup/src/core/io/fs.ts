import type { Stats } from "node:fs"
import {
	lstat,
	mkdir,
	readdir,
	readFile,
	realpath,
	rename,
	rm,
	stat,
	writeFile,
} from "node:fs/promises"
import { isNotFound } from "../../utils/errors.js"
import type { IoResult } from "./types.js"
import { ioFailure } from "./types.js"

export type { IoResult } from "./types.js"

export async function safeStat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, targetPath, "stat")
	}
}

export async function safeLstat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, targetPath, "lstat")
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	try {
		await mkdir(targetPath, { recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, targetPath, "create directory")
	}
}

/**
 * Read a UTF-8 file; a missing file yields null.
 */
export async function readTextFileIfExists(
	targetPath: string,
): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, targetPath, "read")
	}
}

/**
 * Like readTextFileIfExists, but anything other than a regular file (a
 * directory, a dangling link) also yields null.
 */
export async function readRegularFileIfExists(
	targetPath: string,
): Promise<IoResult<string | null>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}
	if (stats.value === null || !stats.value.isFile()) {
		return { ok: true, value: null }
	}
	return readTextFileIfExists(targetPath)
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, targetPath, "write")
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, targetPath, "remove")
	}
}

export async function renamePath(from: string, to: string): Promise<IoResult<void>> {
	try {
		await rename(from, to)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, from, `rename to ${to}`)
	}
}

/**
 * Entries of a directory; a missing directory yields an empty list.
 */
export async function listDir(targetPath: string): Promise<IoResult<string[]>> {
	try {
		const entries = await readdir(targetPath)
		return { ok: true, value: entries }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: [] }
		}

		return ioFailure(error, targetPath, "read directory")
	}
}

/**
 * Canonical form of a path. Falls back to null when the path cannot be resolved.
 */
export async function canonicalize(targetPath: string): Promise<string | null> {
	try {
		return await realpath(targetPath)
	} catch {
		return null
	}
}
