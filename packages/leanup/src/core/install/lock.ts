import { open, readFile } from "node:fs/promises"
import { errorCode, isAlreadyExists, isNotFound } from "../../utils/errors.js"
import { sleep } from "../../utils/sleep.js"
import type { Cfg } from "../config.js"
import { removePath } from "../io/fs.js"
import { ioFailure, type IoResult } from "../io/types.js"

// Ends in .lock so toolchain listing skips it
const TAKEOVER_SUFFIX = ".takeover.lock"

/**
 * Exclusive inter-process lock backed by a file holding the owner's PID.
 */
export interface FileLock {
	path: string
	release(): Promise<IoResult<void>>
}

/**
 * Acquire the lock at lockPath, polling until it is free. A lock whose
 * owner process no longer exists is treated as abandoned and taken over.
 */
export async function acquireFileLock(cfg: Cfg, lockPath: string): Promise<IoResult<FileLock>> {
	let announced = false

	while (true) {
		const created = await tryCreate(lockPath)
		if (!created.ok) {
			return created
		}
		if (created.value) {
			return {
				ok: true,
				value: { path: lockPath, release: () => removePath(lockPath) },
			}
		}

		const holder = await readHolder(lockPath)
		if (!holder.ok) {
			return holder
		}
		if (holder.value === null) {
			continue
		}

		if (isAbandoned(holder.value)) {
			const cleared = await clearAbandonedLock(cfg, lockPath)
			if (!cleared.ok) {
				return cleared
			}
			continue
		}

		if (!announced) {
			cfg.notify.onEvent({
				path: lockPath,
				pid: holder.value || "unknown",
				type: "waiting_for_file_lock",
			})
			announced = true
		}
		await sleep(cfg.lockPollIntervalMs)
	}
}

/**
 * Remove an abandoned lock file. Removal happens only while holding the
 * takeover guard and only if the lock still names a dead process, so a lock
 * created by another waiter after the abandoned one is gone is never removed.
 */
async function clearAbandonedLock(cfg: Cfg, lockPath: string): Promise<IoResult<void>> {
	const guardPath = `${lockPath}${TAKEOVER_SUFFIX}`
	const guard = await tryCreate(guardPath)
	if (!guard.ok) {
		return guard
	}

	if (!guard.value) {
		const owner = await readHolder(guardPath)
		if (!owner.ok) {
			return owner
		}
		if (owner.value !== null && isAbandoned(owner.value)) {
			return removePath(guardPath)
		}
		await sleep(cfg.lockPollIntervalMs)
		return { ok: true, value: undefined }
	}

	const holder = await readHolder(lockPath)
	const removed =
		holder.ok && holder.value !== null && isAbandoned(holder.value)
			? await removePath(lockPath)
			: holder
	const released = await removePath(guardPath)
	if (!removed.ok) {
		return removed
	}
	return released
}

async function tryCreate(lockPath: string): Promise<IoResult<boolean>> {
	try {
		const handle = await open(lockPath, "wx")
		try {
			await handle.writeFile(String(process.pid), "utf8")
		} finally {
			await handle.close()
		}
		return { ok: true, value: true }
	} catch (error) {
		if (isAlreadyExists(error)) {
			return { ok: true, value: false }
		}
		return ioFailure(error, lockPath, "create lock file")
	}
}

async function readHolder(lockPath: string): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(lockPath, "utf8")
		return { ok: true, value: contents.trim() }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure(error, lockPath, "read lock file")
	}
}

function isAbandoned(holder: string): boolean {
	const pid = Number.parseInt(holder, 10)
	return Number.isInteger(pid) && pid > 0 && !isProcessAlive(pid)
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0)
		return true
	} catch (error) {
		return errorCode(error) !== "ESRCH"
	}
}
