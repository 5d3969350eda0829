import path from "node:path"
import { safeLstat } from "../io/fs.js"
import type { InvalidNameError, Result } from "../types/errors.js"

export const DEFAULT_ORIGIN = "leanprover/lean4"

/**
 * Release name that means "read the pin file from the origin's default branch".
 */
export const PIN_FILE_RELEASE = "lean-toolchain"

export const CHANNELS = ["stable", "beta", "nightly"] as const

export type Channel = (typeof CHANNELS)[number]

const TOOLCHAIN_NAME_PATTERN =
	/^(?:([a-zA-Z0-9-_]+\/[a-zA-Z0-9-_]+):)?([a-zA-Z0-9-.]+)$/

export type ToolchainDescriptor =
	| { readonly kind: "local"; readonly name: string }
	| {
			readonly kind: "remote"
			readonly origin: string
			readonly release: string
			/** Channel (or pin-file sentinel) this release was derived from. */
			readonly fromChannel?: string
	  }

export type RemoteDescriptor = Extract<ToolchainDescriptor, { kind: "remote" }>

/**
 * A descriptor whose release may still be a channel or the pin-file sentinel.
 * Only the resolver turns it into a ToolchainDescriptor.
 */
export interface UnresolvedDescriptor {
	readonly unresolved: ToolchainDescriptor
}

export function isChannel(release: string): release is Channel {
	return CHANNELS.some((channel) => channel === release)
}

/**
 * Parse a raw toolchain name (`[owner/repo:]release`) without touching disk.
 */
export function parseToolchainName(
	name: string,
): Result<UnresolvedDescriptor, InvalidNameError> {
	const match = TOOLCHAIN_NAME_PATTERN.exec(name)
	const release = match?.[2]
	if (!match || release === undefined) {
		return {
			error: {
				message: `invalid toolchain name: '${name}'`,
				target: name,
				type: "invalid_name",
			},
			ok: false,
		}
	}

	const components = [...(match[1]?.split("/") ?? []), release]
	if (!components.every(encodesUnambiguously)) {
		return {
			error: {
				message: `invalid toolchain name: '${name}' (a component may not start or end with '-' or contain '--')`,
				target: name,
				type: "invalid_name",
			},
			ok: false,
		}
	}

	let origin = match[1] ?? DEFAULT_ORIGIN
	if (release.startsWith("nightly") && !origin.endsWith("-nightly")) {
		origin = `${origin}-nightly`
	}

	const fromChannel =
		isChannel(release) || release === PIN_FILE_RELEASE ? release : undefined
	const normalizedRelease = /^[0-9]/.test(release) ? `v${release}` : release

	return {
		ok: true,
		value: {
			unresolved: {
				fromChannel,
				kind: "remote",
				origin,
				release: normalizedRelease,
			},
		},
	}
}

/**
 * Parse a raw toolchain name, preferring an existing linked toolchain of the
 * same name over the remote interpretation.
 */
export async function lookupUnresolvedDescriptor(
	toolchainsDir: string,
	name: string,
): Promise<Result<UnresolvedDescriptor, InvalidNameError>> {
	const parsed = parseToolchainName(name)
	if (!parsed.ok) {
		return parsed
	}

	if (!name.includes(":")) {
		const stats = await safeLstat(path.join(toolchainsDir, name))
		if (stats.ok && stats.value?.isSymbolicLink()) {
			return { ok: true, value: { unresolved: { kind: "local", name } } }
		}
	}

	return parsed
}

export function displayDescriptor(descriptor: ToolchainDescriptor): string {
	return descriptor.kind === "local"
		? descriptor.name
		: `${descriptor.origin}:${descriptor.release}`
}

/**
 * Identity comparison; the channel a release came from does not participate.
 */
export function sameToolchain(a: ToolchainDescriptor, b: ToolchainDescriptor): boolean {
	if (a.kind === "local" && b.kind === "local") {
		return a.name === b.name
	}
	if (a.kind === "remote" && b.kind === "remote") {
		return a.origin === b.origin && a.release === b.release
	}
	return false
}

/**
 * Parse the display form of an already resolved descriptor. Never resolves.
 */
export function parseResolvedDescriptor(value: string): ToolchainDescriptor {
	const separator = value.indexOf(":")
	if (separator === -1) {
		return { kind: "local", name: value }
	}

	return {
		kind: "remote",
		origin: value.slice(0, separator),
		release: value.slice(separator + 1),
	}
}

// Directory names join components with "--" and "---"
function encodesUnambiguously(component: string): boolean {
	return !component.startsWith("-") && !component.endsWith("-") && !component.includes("--")
}

export function encodeToolchainDir(display: string): string {
	return display.replaceAll("/", "--").replaceAll(":", "---")
}

export function decodeToolchainDir(dirName: string): ToolchainDescriptor {
	return parseResolvedDescriptor(dirName.replaceAll("---", ":").replaceAll("--", "/"))
}

export function toolchainDirName(descriptor: ToolchainDescriptor): string {
	return encodeToolchainDir(displayDescriptor(descriptor))
}
