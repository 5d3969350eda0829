import { consola } from "consola"
import { table } from "table"
import { ensureInstalled } from "../core/active.js"
import {
	listOverrides,
	removeNonexistentOverrides,
	removeOverride,
	setOverride,
} from "../core/override/database.js"
import { lookupUnresolvedDescriptor } from "../core/toolchain/descriptor.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"
import { CommandResult, printOutcome } from "./types.js"

export async function overrideSet(toolchain: string, options: { path?: string }): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	const unresolved = await lookupUnresolvedDescriptor(cfg.toolchainsDir, toolchain)
	if (!unresolved.ok) {
		printError(unresolved.error)
		return
	}

	const installed = await ensureInstalled(cfg, unresolved.value, `toolchain '${toolchain}'`)
	if (!installed.ok) {
		printError(installed.error)
		return
	}

	const set = await setOverride(cfg, options.path ?? process.cwd(), installed.value.descriptor)
	if (!set.ok) {
		printError(set.error)
		return
	}

	printOutcome(CommandResult.completed(set.value))
}

export async function overrideUnset(options: {
	path?: string
	nonexistent: boolean
}): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	if (options.nonexistent) {
		const removed = await removeNonexistentOverrides(cfg)
		if (!removed.ok) {
			printError(removed.error)
			return
		}
		printOutcome(
			removed.value.length > 0
				? CommandResult.completed(removed.value)
				: CommandResult.unchanged("no nonexistent paths detected"),
		)
		return
	}

	const dir = options.path ?? process.cwd()
	const removed = await removeOverride(cfg, dir)
	if (!removed.ok) {
		printError(removed.error)
		return
	}

	printOutcome(
		removed.value
			? CommandResult.completed(dir)
			: CommandResult.unchanged(`no override toolchain for '${dir}'`),
	)
}

export async function overrideList(): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}

	const overrides = await listOverrides(session.value.cfg)
	if (!overrides.ok) {
		printError(overrides.error)
		return
	}

	if (overrides.value.length === 0) {
		consola.info("no overrides")
		return
	}

	const rows = [
		["Directory", "Toolchain"],
		...overrides.value.map((entry) => [entry.path, entry.toolchain]),
	]
	console.log(table(rows))
}
