import path from "node:path"
import type { Cfg } from "../config.js"
import { ensureDir, readTextFileIfExists, writeTextFile } from "../io/fs.js"
import type { IoResult } from "../io/types.js"

/**
 * Directories that have been seen with a pin file. Append-only; GC reads it.
 */
export async function readProjectRoots(cfg: Cfg): Promise<IoResult<string[]>> {
	const contents = await readTextFileIfExists(cfg.knownProjectsFile)
	if (!contents.ok) {
		return contents
	}

	return {
		ok: true,
		value: (contents.value ?? "").split("\n").filter((line) => line.length > 0),
	}
}

/**
 * Record a project root. Returns false when it was already known.
 */
export async function addProjectRoot(cfg: Cfg, root: string): Promise<IoResult<boolean>> {
	const roots = await readProjectRoots(cfg)
	if (!roots.ok) {
		return roots
	}
	if (roots.value.includes(root)) {
		return { ok: true, value: false }
	}

	const dir = await ensureDir(path.dirname(cfg.knownProjectsFile))
	if (!dir.ok) {
		return dir
	}

	const written = await writeTextFile(cfg.knownProjectsFile, [...roots.value, root].join("\n"))
	if (!written.ok) {
		return written
	}

	cfg.notify.onEvent({ path: root, type: "recorded_project_root" })
	return { ok: true, value: true }
}
