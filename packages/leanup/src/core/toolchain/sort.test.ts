import { describe, expect, it } from "vitest"
import { displayDescriptor, parseResolvedDescriptor } from "./descriptor.js"
import { releaseVersion, sortToolchains } from "./sort.js"

function sortNames(names: string[]): string[] {
	return sortToolchains(names.map(parseResolvedDescriptor)).map(displayDescriptor)
}

describe("sortToolchains", () => {
	it("orders releases of one origin by semantic version", () => {
		expect(
			sortNames([
				"leanprover/lean4:v4.10.0",
				"leanprover/lean4:v4.9.0",
				"leanprover/lean4:v4.10.0-rc1",
				"leanprover/lean4:v4.2.0",
			]),
		).toEqual([
			"leanprover/lean4:v4.2.0",
			"leanprover/lean4:v4.9.0",
			"leanprover/lean4:v4.10.0-rc1",
			"leanprover/lean4:v4.10.0",
		])
	})

	it("orders nightlies by date", () => {
		expect(
			sortNames([
				"leanprover/lean4-nightly:nightly-2024-02-01",
				"leanprover/lean4-nightly:nightly-2023-12-31",
			]),
		).toEqual([
			"leanprover/lean4-nightly:nightly-2023-12-31",
			"leanprover/lean4-nightly:nightly-2024-02-01",
		])
	})

	it("falls back to the display name across origins and for custom toolchains", () => {
		expect(sortNames(["zeta", "leanprover/lean4:v4.9.0", "alpha"])).toEqual([
			"alpha",
			"leanprover/lean4:v4.9.0",
			"zeta",
		])
	})
})

describe("releaseVersion", () => {
	it("parses tags with and without the v prefix", () => {
		expect(releaseVersion("v4.9.0")?.version).toBe("4.9.0")
		expect(releaseVersion("4.10.0-rc2")?.prerelease).toEqual(["rc2"])
		expect(releaseVersion("nightly-2024-01-01")).toBeNull()
	})
})
