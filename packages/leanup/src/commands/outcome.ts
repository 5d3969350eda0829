import { consola } from "consola"
import type { ZodError } from "zod"
import type { BaseError } from "../core/types/errors.js"

const DETAIL_KEYS = [
	"target",
	"origin",
	"channel",
	"platform",
	"field",
	"path",
	"operation",
	"source",
	"status",
	"url",
] as const

type DetailKey = (typeof DETAIL_KEYS)[number]

type PrintableError = BaseError & {
	[K in DetailKey]?: string | number
} & {
	zodError?: ZodError
}

/**
 * Render an error and its causes, one indented line per level, with the
 * structured fields of each error appended as `key=value` pairs.
 */
export function formatErrorChain(error: PrintableError, indent = 0): string {
	const prefix = " ".repeat(indent)
	const details = DETAIL_KEYS.flatMap((key) => {
		const value = error[key]
		return value === undefined ? [] : [`${key}=${value}`]
	})
	const lines = [
		`${prefix}[${error.type}] ${error.message}${details.length > 0 ? ` (${details.join(", ")})` : ""}`,
	]

	for (const issue of error.zodError?.issues ?? []) {
		const location = issue.path.length > 0 ? issue.path.join(".") : "<root>"
		lines.push(`${prefix}  - ${location}: ${issue.message}`)
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`, formatErrorChain(error.cause, indent + 2))
	}

	return lines.join("\n")
}

/**
 * What to run next for the errors a user can fix from the command line.
 */
export function errorHint(error: BaseError): string | null {
	switch (error.type) {
		case "no_default_toolchain":
			return "set one with 'leanup default stable', or pin a project with a lean-toolchain file"
		case "not_installed":
			return "see 'leanup toolchain list' for the installed toolchains"
		case "network":
			return "set LEANUP_OFFLINE=1 to use installed releases only"
		default:
			return null
	}
}

export function printError(error: PrintableError): void {
	consola.error(formatErrorChain(error))
	const hint = errorHint(error)
	if (hint) {
		consola.info(hint)
	}

	for (let current: BaseError | undefined = error; current; current = current.cause) {
		if (current.rawError) {
			consola.debug(current.rawError)
		}
	}
	process.exitCode = 1
}
