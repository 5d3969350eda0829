import semver from "semver"
import { displayDescriptor, type ToolchainDescriptor } from "./descriptor.js"

/**
 * Semantic version of a release tag (`v4.9.0`, `4.10.0-rc1`), or null.
 */
export function releaseVersion(release: string): semver.SemVer | null {
	return semver.parse(release.replace(/^v/, ""))
}

export function compareToolchains(a: ToolchainDescriptor, b: ToolchainDescriptor): number {
	if (a.kind === "remote" && b.kind === "remote" && a.origin === b.origin) {
		const left = releaseVersion(a.release)
		const right = releaseVersion(b.release)
		if (left && right) {
			return semver.compare(left, right)
		}
	}

	const left = displayDescriptor(a)
	const right = displayDescriptor(b)
	if (left === right) return 0
	return left < right ? -1 : 1
}

export function sortToolchains(toolchains: ToolchainDescriptor[]): ToolchainDescriptor[] {
	return [...toolchains].sort(compareToolchains)
}
