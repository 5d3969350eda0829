import { consola } from "consola"
import { clearDefaultToolchain, getDefaultToolchain, setDefaultToolchain } from "../core/active.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"
import { CommandResult, printOutcome } from "./types.js"

export async function defaultCommand(toolchain: string | undefined): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	if (toolchain === undefined) {
		const current = await getDefaultToolchain(cfg)
		if (!current.ok) {
			printError(current.error)
			return
		}
		consola.log(current.value ?? "no default toolchain configured")
		return
	}

	if (toolchain === "none") {
		const cleared = await clearDefaultToolchain(cfg)
		if (!cleared.ok) {
			printError(cleared.error)
			return
		}
		printOutcome(CommandResult.completed(undefined))
		return
	}

	const result = await setDefaultToolchain(cfg, toolchain)
	if (!result.ok) {
		printError(result.error)
		return
	}
	printOutcome(CommandResult.completed(result.value))
}
