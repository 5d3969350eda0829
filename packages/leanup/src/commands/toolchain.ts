import { consola } from "consola"
import { getDefaultToolchain } from "../core/active.js"
import { resolveToolchainName } from "../core/resolve/resolver.js"
import { displayDescriptor, parseToolchainName } from "../core/toolchain/descriptor.js"
import { listToolchains, Toolchain } from "../core/toolchain/toolchain.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"
import { CommandResult, printOutcome } from "./types.js"

export async function toolchainInstall(names: string[]): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	for (const name of names) {
		const resolved = await resolveToolchainName(cfg, name, {
			allowCacheFallback: false,
			allowNetwork: true,
		})
		if (!resolved.ok) {
			printError(resolved.error)
			return
		}

		const installed = await new Toolchain(cfg, resolved.value).installIfNotInstalled()
		if (!installed.ok) {
			printError(installed.error)
			return
		}
	}

	printOutcome(CommandResult.completed(undefined))
}

export async function toolchainUninstall(names: string[]): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	for (const name of names) {
		const resolved = await resolveToolchainName(cfg, name, {
			allowCacheFallback: true,
			allowNetwork: true,
		})
		if (!resolved.ok) {
			printError(resolved.error)
			return
		}

		const removed = await new Toolchain(cfg, resolved.value).remove()
		if (!removed.ok) {
			printError(removed.error)
			return
		}
	}

	printOutcome(CommandResult.completed(undefined))
}

export async function toolchainLink(name: string, source: string): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	const parsed = parseToolchainName(name)
	if (!parsed.ok || name.includes(":")) {
		printError({
			message: `invalid custom toolchain name: '${name}'`,
			target: name,
			type: "invalid_name",
		})
		return
	}

	const toolchain = new Toolchain(cfg, { kind: "local", name })
	const linked = await toolchain.installFromDir(source, { link: true })
	if (!linked.ok) {
		printError(linked.error)
		return
	}

	printOutcome(CommandResult.completed(undefined))
}

export async function toolchainList(): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg } = session.value

	const installed = await listToolchains(cfg)
	if (!installed.ok) {
		printError(installed.error)
		return
	}

	if (installed.value.length === 0) {
		consola.info("no installed toolchains")
		return
	}

	const defaultName = await getDefaultToolchain(cfg)
	if (!defaultName.ok) {
		printError(defaultName.error)
		return
	}

	for (const descriptor of installed.value) {
		const name = displayDescriptor(descriptor)
		consola.log(name === defaultName.value ? `${name} (default)` : name)
	}
}
