import { describe, expect, it } from "vitest"
import { z } from "zod"
import { formatBytes } from "./notify.js"
import { errorHint, formatErrorChain } from "./outcome.js"

describe("formatErrorChain", () => {
	it("prints details and the cause chain", () => {
		const error = {
			cause: {
				message: "Failed to read /p: denied",
				operation: "read",
				path: "/p",
				type: "io",
			},
			message: "failed to download",
			type: "network",
			url: "https://example.com/a.tar.zst",
		}

		expect(formatErrorChain(error)).toBe(
			[
				"[network] failed to download (url=https://example.com/a.tar.zst)",
				"Caused by:",
				"  [io] Failed to read /p: denied (path=/p, operation=read)",
			].join("\n"),
		)
	})

	it("lists zod issues under the error", () => {
		const parsed = z.object({ version: z.string() }).safeParse({ version: 12 })
		if (parsed.success) {
			throw new Error("expected a parse failure")
		}

		const rendered = formatErrorChain({
			message: "settings file is invalid",
			path: "/home/u/.leanup/settings.toml",
			source: "settings",
			type: "invalid_config",
			zodError: parsed.error,
		})

		expect(rendered).toBe(
			[
				"[invalid_config] settings file is invalid (path=/home/u/.leanup/settings.toml, source=settings)",
				"  - version: Expected string, received number",
			].join("\n"),
		)
	})
})

describe("errorHint", () => {
	it("points at the default command when nothing selects a toolchain", () => {
		expect(errorHint({ message: "no default toolchain", type: "no_default_toolchain" })).toBe(
			"set one with 'leanup default stable', or pin a project with a lean-toolchain file",
		)
	})

	it("has nothing to add for other errors", () => {
		expect(errorHint({ message: "bad name", type: "invalid_name" })).toBeNull()
	})
})

describe("formatBytes", () => {
	it.each([
		[512, "512 B"],
		[2048, "2.0 KiB"],
		[5 * 1024 * 1024, "5.0 MiB"],
	])("formats %d as %s", (bytes, expected) => {
		expect(formatBytes(bytes)).toBe(expected)
	})
})
