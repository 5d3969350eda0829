/**
 * Integration tests for installed toolchain handles
 */

import { lstat, mkdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { displayDescriptor } from "../../src/core/toolchain/descriptor.js"
import { listToolchains, Toolchain } from "../../src/core/toolchain/toolchain.js"
import { createTestCfg, installFakeToolchain, linkFakeToolchain } from "../helpers/cfg.js"
import { exists, fakeToolchainDir, withTempDir } from "../helpers/fs.js"

// Import assertions to register custom matchers
import "../helpers/assertions.js"

describe("Toolchain", () => {
	describe("installFromDir", () => {
		it("links a local build", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const build = join(dir, "build")
				await fakeToolchainDir(build)
				const toolchain = new Toolchain(cfg, { kind: "local", name: "my-build" })

				const result = await toolchain.installFromDir(build, { link: true })

				expect(result).toBeOk()
				expect(toolchain.path).toBe(join(cfg.toolchainsDir, "my-build"))
				expect(await toolchain.isLinked()).toBe(true)
				expect(await toolchain.exists()).toBe(true)
			})
		})

		it("copies a local build", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const build = join(dir, "build")
				await fakeToolchainDir(build)
				const toolchain = new Toolchain(cfg, { kind: "local", name: "my-copy" })

				await toolchain.installFromDir(build, { link: false })

				expect(await toolchain.isLinked()).toBe(false)
				expect(await readFile(join(toolchain.path, "bin", "lean"), "utf8")).toBe("#!/bin/sh\n")
			})
		})

		it("replaces an earlier link of the same name", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await linkFakeToolchain(cfg, "my-build", join(dir, "old"))
				const fresh = join(dir, "new")
				await fakeToolchainDir(fresh)
				const toolchain = new Toolchain(cfg, { kind: "local", name: "my-build" })

				expect(await toolchain.installFromDir(fresh, { link: true })).toBeOk()
				expect(await exists(join(dir, "old", "bin", "lean"))).toBe(true)
			})
		})

		it("rejects a directory without bin/lean", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const build = join(dir, "build")
				await mkdir(build)
				const toolchain = new Toolchain(cfg, { kind: "local", name: "my-build" })

				expect(await toolchain.installFromDir(build, { link: true })).toBeErrOfType(
					"binary_not_found",
				)
				expect(await exists(toolchain.path)).toBe(false)
			})
		})
	})

	describe("install", () => {
		it("refuses to reinstall an existing toolchain", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				await installFakeToolchain(cfg, "leanprover--lean4---v4.9.0")
				const toolchain = new Toolchain(cfg, {
					kind: "remote",
					origin: "leanprover/lean4",
					release: "v4.9.0",
				})

				expect(await toolchain.install()).toBeErrOfType("already_installed")
				expect(await toolchain.installIfNotInstalled()).toBeOk()
			})
		})

		it("cannot install a custom toolchain from a release", async () => {
			await withTempDir(async (dir) => {
				const { cfg, http } = createTestCfg(dir)
				const toolchain = new Toolchain(cfg, { kind: "local", name: "missing" })

				expect(await toolchain.install()).toBeErrOfType("not_installed")
				expect(http.requests).toEqual([])
			})
		})
	})

	describe("remove", () => {
		it("removes a link without touching its target", async () => {
			await withTempDir(async (dir) => {
				const { cfg } = createTestCfg(dir)
				const build = join(dir, "build")
				await linkFakeToolchain(cfg, "my-build", build)
				const toolchain = new Toolchain(cfg, { kind: "local", name: "my-build" })

				expect(await toolchain.remove()).toBeOk()
				expect(await exists(toolchain.path)).toBe(false)
				expect((await lstat(join(build, "bin", "lean"))).isFile()).toBe(true)
			})
		})

		it("only notifies when the toolchain is absent", async () => {
			await withTempDir(async (dir) => {
				const { cfg, sink } = createTestCfg(dir)
				const toolchain = new Toolchain(cfg, { kind: "local", name: "missing" })

				expect(await toolchain.remove()).toBeOk()
				expect(sink.ofType("toolchain_not_installed")).toEqual([
					{ toolchain: "missing", type: "toolchain_not_installed" },
				])
			})
		})
	})

	it("places binaries under bin with the platform suffix", async () => {
		await withTempDir(async (dir) => {
			const { cfg } = createTestCfg(dir)
			const linux = new Toolchain(cfg, { kind: "local", name: "my-build" })
			const windows = new Toolchain(
				{ ...cfg, platform: { arch: "x64", os: "win32" } },
				{ kind: "local", name: "my-build" },
			)

			expect(linux.binaryFile("lake")).toBe(join(cfg.toolchainsDir, "my-build", "bin", "lake"))
			expect(windows.binaryFile("lake")).toBe(
				join(cfg.toolchainsDir, "my-build", "bin", "lake.exe"),
			)
		})
	})
})

describe("listToolchains", () => {
	it("lists installs and links, skipping staging and lock entries", async () => {
		await withTempDir(async (dir) => {
			const { cfg } = createTestCfg(dir)
			await installFakeToolchain(cfg, "leanprover--lean4---v4.10.0")
			await installFakeToolchain(cfg, "leanprover--lean4---v4.9.0")
			await installFakeToolchain(cfg, "leanprover--lean4---v4.11.0.tmp")
			await linkFakeToolchain(cfg, "my-build", join(dir, "build"))
			await mkdir(join(cfg.toolchainsDir, "leanprover--lean4---v4.11.0.lock"))

			const result = await listToolchains(cfg)

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.map(displayDescriptor)).toEqual([
					"leanprover/lean4:v4.9.0",
					"leanprover/lean4:v4.10.0",
					"my-build",
				])
			}
		})
	})

	it("is empty before anything is installed", async () => {
		await withTempDir(async (dir) => {
			const { cfg } = createTestCfg(dir)

			expect(await listToolchains(cfg)).toEqual({ ok: true, value: [] })
		})
	})
})
