/**
 * Integration tests for override lookup
 *
 * Builds project trees in a temporary directory and checks which source
 * decides the toolchain for a given working directory.
 */

import { mkdir, readFile, rm } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { removeOverride, setOverride } from "../../src/core/override/database.js"
import { findOverride } from "../../src/core/override/locator.js"
import type { ToolchainDescriptor } from "../../src/core/toolchain/descriptor.js"
import { createTestCfg, installFakeToolchain, linkFakeToolchain } from "../helpers/cfg.js"
import { withTempDir, writeTree } from "../helpers/fs.js"

// Import assertions to register custom matchers
import "../helpers/assertions.js"

const V4_9: ToolchainDescriptor = { kind: "remote", origin: "leanprover/lean4", release: "v4.9.0" }

describe("findOverride", () => {
	describe("pin files", () => {
		it("finds a pin file in an ancestor directory", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const project = join(dir, "proj")
				await writeTree(project, { "lean-toolchain": "leanprover/lean4:v4.9.0\n" })
				const nested = join(project, "src", "deep")
				await mkdir(nested, { recursive: true })

				const result = await findOverride(cfg, nested)

				expect(result).toEqual({
					ok: true,
					value: {
						descriptor: { unresolved: V4_9 },
						reason: { kind: "toolchain_file", path: join(project, "lean-toolchain") },
					},
				})
			})
		})

		it("records the project root once", async () => {
			await withTempDir(async (dir) => {
				const { cfg, sink } = createTestCfg(dir)
				const project = join(dir, "proj")
				await writeTree(project, { "lean-toolchain": "stable" })

				await findOverride(cfg, project)
				await findOverride(cfg, project)

				expect(await readFile(cfg.knownProjectsFile, "utf8")).toBe(project)
				expect(sink.ofType("recorded_project_root")).toEqual([
					{ path: project, type: "recorded_project_root" },
				])
			})
		})

		it("only reads the first line", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, { "proj/lean-toolchain": "  nightly  \nignored\n" })

				const result = await findOverride(cfg, join(dir, "proj"))

				expect(result).toBeOkWith(
					(match) =>
						match?.descriptor.unresolved.kind === "remote" &&
						match.descriptor.unresolved.origin === "leanprover/lean4-nightly" &&
						match.descriptor.unresolved.release === "nightly",
				)
			})
		})

		it("rejects an empty pin file", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, { "proj/lean-toolchain": "\n" })

				const result = await findOverride(cfg, join(dir, "proj"))

				expect(result).toBeErrOfType("invalid_config")
			})
		})

		it("rejects a malformed toolchain name", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, { "proj/lean-toolchain": "not a toolchain" })

				const result = await findOverride(cfg, join(dir, "proj"))

				expect(result).toBeErrOfType("invalid_config")
				if (!result.ok && result.error.type === "invalid_config") {
					expect(result.error.source).toBe("pin_file")
					expect(result.error.cause?.type).toBe("invalid_name")
				}
			})
		})

		it("skips a lean-toolchain entry that is not a file", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, { "lean-toolchain": "leanprover/lean4:v4.9.0\n" })
				const inner = join(dir, "inner")
				await mkdir(join(inner, "lean-toolchain"), { recursive: true })

				const result = await findOverride(cfg, inner)

				expect(result).toEqual({
					ok: true,
					value: {
						descriptor: { unresolved: V4_9 },
						reason: { kind: "toolchain_file", path: join(dir, "lean-toolchain") },
					},
				})
			})
		})

		it("refers to a linked toolchain by its bare name", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await linkFakeToolchain(cfg, "my-build", join(dir, "build"))
				await writeTree(dir, { "proj/lean-toolchain": "my-build" })

				const result = await findOverride(cfg, join(dir, "proj"))

				expect(result).toBeOkWith(
					(match) =>
						match?.descriptor.unresolved.kind === "local" &&
						match.descriptor.unresolved.name === "my-build",
				)
			})
		})
	})

	describe("precedence", () => {
		it("prefers a database entry over a pin file in the same directory", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const project = join(dir, "proj")
				await writeTree(project, { "lean-toolchain": "stable" })
				await setOverride(cfg, project, V4_9)

				const result = await findOverride(cfg, project)

				expect(result).toEqual({
					ok: true,
					value: {
						descriptor: { unresolved: V4_9 },
						reason: { kind: "override_db", path: project },
					},
				})
			})
		})

		it("prefers a nearer pin file over a farther database entry", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await setOverride(cfg, dir, V4_9)
				await writeTree(dir, { "proj/lean-toolchain": "leanprover/lean4:v4.8.0" })

				const result = await findOverride(cfg, join(dir, "proj"))

				expect(result).toBeOkWith((match) => match?.reason.kind === "toolchain_file")
			})
		})

		it("prefers a nearer database entry over a farther pin file", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, { "lean-toolchain": "leanprover/lean4:v4.8.0" })
				const sub = join(dir, "sub")
				await mkdir(sub)
				await setOverride(cfg, sub, V4_9)

				const result = await findOverride(cfg, sub)

				expect(result).toBeOkWith(
					(match) => match?.reason.kind === "override_db" && match.reason.path === sub,
				)
			})
		})

		it("reveals the pin file once the database entry is removed", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const project = join(dir, "proj")
				await writeTree(project, { "lean-toolchain": "leanprover/lean4:v4.8.0" })
				await setOverride(cfg, project, V4_9)

				expect(await findOverride(cfg, project)).toBeOkWith(
					(match) => match?.reason.kind === "override_db",
				)

				expect(await removeOverride(cfg, project)).toEqual({ ok: true, value: true })
				const result = await findOverride(cfg, project)

				expect(result).toEqual({
					ok: true,
					value: {
						descriptor: {
							unresolved: { kind: "remote", origin: "leanprover/lean4", release: "v4.8.0" },
						},
						reason: { kind: "toolchain_file", path: join(project, "lean-toolchain") },
					},
				})
			})
		})

		it("checks the database and the pin file per level across three directories", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const outer = join(dir, "outer")
				const middle = join(outer, "middle")
				const inner = join(middle, "inner")
				await mkdir(inner, { recursive: true })
				await writeTree(middle, { "lean-toolchain": "leanprover/lean4:v4.8.0" })
				await setOverride(cfg, outer, {
					kind: "remote",
					origin: "leanprover/lean4",
					release: "v4.7.0",
				})

				expect(await findOverride(cfg, inner)).toBeOkWith(
					(match) =>
						match?.reason.kind === "toolchain_file" &&
						match.reason.path === join(middle, "lean-toolchain"),
				)

				await setOverride(cfg, inner, V4_9)
				expect(await findOverride(cfg, inner)).toBeOkWith(
					(match) => match?.reason.kind === "override_db" && match.reason.path === inner,
				)

				await removeOverride(cfg, inner)
				await rm(join(middle, "lean-toolchain"))
				expect(await findOverride(cfg, inner)).toBeOkWith(
					(match) =>
						match?.reason.kind === "override_db" &&
						match.reason.path === outer &&
						match.descriptor.unresolved.kind === "remote" &&
						match.descriptor.unresolved.release === "v4.7.0",
				)
			})
		})

		it("lets the environment override win over everything", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir, { envOverride: "leanprover/lean4:v4.0.0" })
				await writeTree(dir, { "proj/lean-toolchain": "stable" })

				const result = await findOverride(cfg, join(dir, "proj"))

				expect(result).toEqual({
					ok: true,
					value: {
						descriptor: {
							unresolved: { kind: "remote", origin: "leanprover/lean4", release: "v4.0.0" },
						},
						reason: { kind: "environment" },
					},
				})
			})
		})

		it("prefers a pin file over leanpkg.toml", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, {
					"proj/lean-toolchain": "stable",
					"proj/leanpkg.toml": '[package]\nlean_version = "nightly"\n',
				})

				const result = await findOverride(cfg, join(dir, "proj"))

				expect(result).toBeOkWith((match) => match?.reason.kind === "toolchain_file")
			})
		})
	})

	describe("leanpkg.toml", () => {
		it("uses package.lean_version", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, {
					"legacy/leanpkg.toml": '[package]\nlean_version = "leanprover/lean4:v4.0.0"\n',
				})

				const result = await findOverride(cfg, join(dir, "legacy"))

				expect(result).toEqual({
					ok: true,
					value: {
						descriptor: {
							unresolved: { kind: "remote", origin: "leanprover/lean4", release: "v4.0.0" },
						},
						reason: { kind: "leanpkg_file", path: join(dir, "legacy", "leanpkg.toml") },
					},
				})
			})
		})

		it("skips a leanpkg.toml without lean_version", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await writeTree(dir, {
					"lean-toolchain": "stable",
					"legacy/leanpkg.toml": '[package]\nname = "legacy"\n',
				})

				const result = await findOverride(cfg, join(dir, "legacy"))

				expect(result).toBeOkWith(
					(match) =>
						match?.reason.kind === "toolchain_file" &&
						match.reason.path === join(dir, "lean-toolchain"),
				)
			})
		})
	})

	describe("toolchain directories", () => {
		it("uses the toolchain a directory belongs to", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const installed = await installFakeToolchain(cfg, "leanprover--lean4---v4.9.0")

				const result = await findOverride(cfg, join(installed, "bin"))

				expect(result).toEqual({
					ok: true,
					value: {
						descriptor: { unresolved: V4_9 },
						reason: { kind: "inside_toolchain", path: installed },
					},
				})
			})
		})
	})

	it("returns null when nothing applies", async () => {
		await withTempDir(async (dir) => {
			const { cfg } = createTestCfg(dir)
			const empty = join(dir, "empty")
			await mkdir(empty)

			const result = await findOverride(cfg, empty)

			expect(result).toEqual({ ok: true, value: null })
		})
	})
})
