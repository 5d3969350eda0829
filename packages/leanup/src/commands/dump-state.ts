import { buildStateDump } from "../core/state.js"
import { LEANUP_VERSION } from "../version.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"

export async function dumpStateCommand(): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}

	const state = await buildStateDump(session.value.cfg, process.cwd(), LEANUP_VERSION)
	if (!state.ok) {
		printError(state.error)
		return
	}

	console.log(JSON.stringify(state.value, null, 2))
}
