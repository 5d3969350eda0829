#!/usr/bin/env node

import { Command } from "commander"
import { consola } from "consola"
import { defaultCommand } from "./commands/default.js"
import { dumpStateCommand } from "./commands/dump-state.js"
import { gcCommand } from "./commands/gc.js"
import { overrideList, overrideSet, overrideUnset } from "./commands/override.js"
import { runCommand } from "./commands/run.js"
import { showCommand } from "./commands/show.js"
import {
	toolchainInstall,
	toolchainLink,
	toolchainList,
	toolchainUninstall,
} from "./commands/toolchain.js"
import { whichCommand } from "./commands/which.js"
import { LEANUP_VERSION } from "./version.js"

const DEBUG_LEVEL = 4

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("leanup")
		.description("Lean toolchain installer and version manager")
		.version(LEANUP_VERSION)
		.option("-v, --verbose", "Show debug output")
		.showHelpAfterError()
		.showSuggestionAfterError()
		.hook("preAction", (command) => {
			if (command.opts<{ verbose?: boolean }>().verbose) {
				consola.level = DEBUG_LEVEL
			}
		})

	program
		.command("show")
		.description("Show the active and installed toolchains")
		.action(async () => {
			await showCommand()
		})

	program
		.command("default")
		.description("Print or set the default toolchain ('none' clears it)")
		.argument("[toolchain]", "Toolchain name")
		.action(async (toolchain: string | undefined) => {
			await defaultCommand(toolchain)
		})

	const toolchain = program.command("toolchain").description("Modify or query installed toolchains")

	toolchain
		.command("install")
		.description("Install toolchains")
		.argument("<toolchains...>", "Toolchain names")
		.action(async (names: string[]) => {
			await toolchainInstall(names)
		})

	toolchain
		.command("uninstall")
		.description("Uninstall toolchains")
		.argument("<toolchains...>", "Toolchain names")
		.action(async (names: string[]) => {
			await toolchainUninstall(names)
		})

	toolchain
		.command("link")
		.description("Create a custom toolchain by symlinking to a directory")
		.argument("<toolchain>", "Custom toolchain name")
		.argument("<path>", "Path to the toolchain directory")
		.action(async (name: string, source: string) => {
			await toolchainLink(name, source)
		})

	toolchain
		.command("list")
		.description("List installed toolchains")
		.action(async () => {
			await toolchainList()
		})

	const override = program
		.command("override")
		.description("Modify directory toolchain overrides")

	override
		.command("set")
		.description("Set the override toolchain for a directory")
		.argument("<toolchain>", "Toolchain name")
		.option("--path <path>", "Directory to override (defaults to the current directory)")
		.action(async (name: string, options: { path?: string }) => {
			await overrideSet(name, { path: options.path })
		})

	override
		.command("unset")
		.description("Remove the override toolchain for a directory")
		.option("--path <path>", "Directory to clear (defaults to the current directory)")
		.option("--nonexistent", "Remove overrides for directories that no longer exist")
		.action(async (options: { path?: string; nonexistent?: boolean }) => {
			await overrideUnset({
				nonexistent: Boolean(options.nonexistent),
				path: options.path,
			})
		})

	override
		.command("list")
		.description("List directory toolchain overrides")
		.action(async () => {
			await overrideList()
		})

	program
		.command("which")
		.description("Display which binary will be run for a given command")
		.argument("<command>", "Binary name")
		.action(async (binary: string) => {
			await whichCommand(binary)
		})

	program
		.command("run")
		.description("Run a command with an environment configured for a given toolchain")
		.argument("<toolchain>", "Toolchain name")
		.argument("<command...>", "Command and arguments")
		.option("--install", "Install the toolchain if it is missing")
		.passThroughOptions()
		.action(async (name: string, command: string[], options: { install?: boolean }) => {
			await runCommand(name, command, { install: Boolean(options.install) })
		})

	program
		.command("gc")
		.description("List (or delete) toolchains not used by any known project")
		.option("--delete", "Delete the unused toolchains")
		.option("--json", "Print the classification as JSON")
		.action(async (options: { delete?: boolean; json?: boolean }) => {
			await gcCommand({ delete: Boolean(options.delete), json: Boolean(options.json) })
		})

	program
		.command("dump-state")
		.description("Print installed toolchains, the default and the active override as JSON")
		.action(async () => {
			await dumpStateCommand()
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
