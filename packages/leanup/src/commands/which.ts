import { toolchainForDir } from "../core/active.js"
import { safeStat } from "../core/io/fs.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"

export async function whichCommand(binary: string): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}

	const active = await toolchainForDir(session.value.cfg, process.cwd())
	if (!active.ok) {
		printError(active.error)
		return
	}

	const { toolchain } = active.value
	const binaryPath = toolchain.binaryFile(binary)
	const stats = await safeStat(binaryPath)
	if (!stats.ok) {
		printError(stats.error)
		return
	}
	if (!stats.value?.isFile()) {
		printError({
			message: `toolchain '${toolchain.name}' does not have the binary '${binary}'`,
			path: binaryPath,
			target: toolchain.name,
			type: "binary_not_found",
		})
		return
	}

	console.log(binaryPath)
}
