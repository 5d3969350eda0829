import { consola } from "consola"
import { getDefaultToolchain } from "../core/active.js"
import { findOverride } from "../core/override/locator.js"
import { formatOverrideReason } from "../core/override/reason.js"
import { displayDescriptor } from "../core/toolchain/descriptor.js"
import { listToolchains } from "../core/toolchain/toolchain.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"

export async function showCommand(): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	consola.info(`leanup home: ${cfg.homeDir}`)

	const installed = await listToolchains(cfg)
	if (!installed.ok) {
		printError(installed.error)
		return
	}

	const defaultName = await getDefaultToolchain(cfg)
	if (!defaultName.ok) {
		printError(defaultName.error)
		return
	}

	if (installed.value.length === 0) {
		consola.info("No toolchains installed.")
	} else {
		const lines = installed.value.map((descriptor) => `  ${displayDescriptor(descriptor)}`)
		consola.info(`Installed toolchains:\n${lines.join("\n")}`)
	}

	const override = await findOverride(cfg, process.cwd())
	if (!override.ok) {
		printError(override.error)
		return
	}

	if (override.value) {
		const { descriptor, reason } = override.value
		consola.info(
			`Active toolchain: ${displayDescriptor(descriptor.unresolved)} (${formatOverrideReason(reason)})`,
		)
	} else if (defaultName.value) {
		consola.info(`Active toolchain: ${defaultName.value} (default toolchain)`)
	} else {
		consola.info("No active toolchain.")
	}
}
