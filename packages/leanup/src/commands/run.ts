import { spawn } from "node:child_process"
import path from "node:path"
import { ensureInstalled } from "../core/active.js"
import type { Cfg } from "../core/config.js"
import { safeStat } from "../core/io/fs.js"
import { ioFailure, type IoResult } from "../core/io/types.js"
import {
	MAX_RECURSION_DEPTH,
	ONLINE_WITH_FALLBACK,
	resolveDescriptor,
} from "../core/resolve/resolver.js"
import { lookupUnresolvedDescriptor } from "../core/toolchain/descriptor.js"
import { Toolchain } from "../core/toolchain/toolchain.js"
import type { Result } from "../core/types/errors.js"
import { HOME_ENV, RECURSION_COUNT_ENV, TOOLCHAIN_ENV } from "../env.js"
import { printError } from "./outcome.js"
import { createSession } from "./session.js"

export async function runCommand(
	toolchainName: string,
	command: string[],
	options: { install: boolean },
): Promise<void> {
	const session = createSession()
	if (!session.ok) {
		printError(session.error)
		return
	}
	const { cfg, env } = session.value

	if (env.recursionCount >= MAX_RECURSION_DEPTH) {
		printError({
			message: `infinite recursion detected: ${RECURSION_COUNT_ENV} reached ${env.recursionCount}`,
			target: toolchainName,
			type: "recursion_limit",
		})
		return
	}

	const [binary, ...args] = command
	if (!binary) {
		printError({
			field: "command",
			message: "no command given to run",
			source: "manual",
			type: "validation",
		})
		return
	}

	const toolchain = await selectToolchain(cfg, toolchainName, options.install)
	if (!toolchain.ok) {
		printError(toolchain.error)
		return
	}

	const binaryPath = toolchain.value.binaryFile(binary)
	const stats = await safeStat(binaryPath)
	if (!stats.ok) {
		printError(stats.error)
		return
	}
	const program = stats.value?.isFile() ? binaryPath : binary

	const childEnv: NodeJS.ProcessEnv = {
		...process.env,
		[HOME_ENV]: cfg.homeDir,
		PATH: [path.join(toolchain.value.path, "bin"), process.env.PATH]
			.filter((entry) => entry !== undefined && entry.length > 0)
			.join(path.delimiter),
		[RECURSION_COUNT_ENV]: String(env.recursionCount + 1),
		[TOOLCHAIN_ENV]: toolchain.value.name,
	}

	const exit = await runProcess(program, args, childEnv)
	if (!exit.ok) {
		printError(exit.error)
		return
	}
	process.exitCode = exit.value
}

async function selectToolchain(
	cfg: Cfg,
	name: string,
	install: boolean,
): Promise<Result<Toolchain>> {
	const unresolved = await lookupUnresolvedDescriptor(cfg.toolchainsDir, name)
	if (!unresolved.ok) {
		return unresolved
	}

	if (install) {
		return ensureInstalled(cfg, unresolved.value, `toolchain '${name}'`)
	}

	const resolved = await resolveDescriptor(cfg, unresolved.value, ONLINE_WITH_FALLBACK)
	if (!resolved.ok) {
		return resolved
	}

	const toolchain = new Toolchain(cfg, resolved.value)
	if (!(await toolchain.exists())) {
		return {
			error: {
				message: `toolchain '${toolchain.name}' is not installed; pass --install to install it`,
				path: toolchain.path,
				target: toolchain.name,
				type: "not_installed",
			},
			ok: false,
		}
	}
	return { ok: true, value: toolchain }
}

function runProcess(
	program: string,
	args: string[],
	env: NodeJS.ProcessEnv,
): Promise<IoResult<number>> {
	return new Promise((resolve) => {
		const child = spawn(program, args, { env, stdio: "inherit" })
		child.on("error", (error) => resolve(ioFailure(error, program, "spawn")))
		child.on("close", (code, signal) => {
			resolve({ ok: true, value: code ?? (signal ? 1 : 0) })
		})
	})
}
