import { consola } from "consola"
import { analyzeToolchains } from "../core/gc/analyze.js"
import { displayDescriptor } from "../core/toolchain/descriptor.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"
import { CommandResult, printOutcome } from "./types.js"

export async function gcCommand(options: { delete: boolean; json: boolean }): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	const analysis = await analyzeToolchains(cfg)
	if (!analysis.ok) {
		printError(analysis.error)
		return
	}
	const { unused, used } = analysis.value

	if (options.json) {
		console.log(
			JSON.stringify(
				{
					unused: unused.map((toolchain) => toolchain.name),
					used: used.map(([label, descriptor]) => ({
						reason: label,
						toolchain: displayDescriptor(descriptor),
					})),
				},
				null,
				2,
			),
		)
		return
	}

	if (used.length > 0) {
		const lines = used.map(([label, descriptor]) => `  ${displayDescriptor(descriptor)} (${label})`)
		consola.info(`Used toolchains:\n${lines.join("\n")}`)
	}

	if (unused.length === 0) {
		printOutcome(CommandResult.unchanged("No unused toolchains found."))
		return
	}

	if (!options.delete) {
		consola.info(
			`Unused toolchains:\n${unused.map((toolchain) => `  ${toolchain.name}`).join("\n")}`,
		)
		consola.info("Run `leanup gc --delete` to remove them.")
		return
	}

	for (const toolchain of unused) {
		const removed = await toolchain.remove()
		if (!removed.ok) {
			printError(removed.error)
			return
		}
	}
	printOutcome(CommandResult.completed(unused.length))
}
