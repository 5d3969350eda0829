/**
 * Integration tests for the machine-readable state dump
 */

import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { buildStateDump } from "../../src/core/state.js"
import { createTestCfg, installFakeToolchain } from "../helpers/cfg.js"
import { withTempDir, writeTree } from "../helpers/fs.js"

// Import assertions to register custom matchers
import "../helpers/assertions.js"

describe("buildStateDump", () => {
	it("describes installed toolchains, the default and the active override", async () => {
		await withTempDir(async (dir) => {
			const { cfg } = createTestCfg(dir, { offline: true })
			const installed = await installFakeToolchain(cfg, "leanprover--lean4---v4.9.0")
			await cfg.settings.withMut((settings) => {
				settings.defaultToolchain = "leanprover/lean4:v4.9.0"
			})
			await writeTree(dir, { "proj/lean-toolchain": "leanprover/lean4:stable" })

			const result = await buildStateDump(cfg, join(dir, "proj"), "0.1.0")

			expect(result).toEqual({
				ok: true,
				value: {
					toolchains: {
						active_override: {
							reason: { kind: "toolchain_file", path: join(dir, "proj", "lean-toolchain") },
							unresolved: "leanprover/lean4:stable",
						},
						default: {
							resolved: "leanprover/lean4:v4.9.0",
							unresolved: "leanprover/lean4:v4.9.0",
						},
						installed: [{ path: installed, resolved_name: "leanprover/lean4:v4.9.0" }],
					},
					version: "0.1.0",
				},
			})
		})
	})

	it("reports an unresolvable default without failing", async () => {
		await withTempDir(async (dir) => {
			const { cfg } = createTestCfg(dir, { offline: true })
			await cfg.settings.withMut((settings) => {
				settings.defaultToolchain = "stable"
			})

			const result = await buildStateDump(cfg, dir, "0.1.0")

			expect(result).toBeOkWith(
				(state) =>
					state.toolchains.default?.unresolved === "stable" &&
					state.toolchains.default.resolved === null &&
					state.toolchains.active_override === null &&
					state.toolchains.installed.length === 0,
			)
		})
	})
})
