import { TOOLCHAIN_ENV } from "../../env.js"

export type OverrideReason =
	| { kind: "environment" }
	| { kind: "override_db"; path: string }
	| { kind: "toolchain_file"; path: string }
	| { kind: "leanpkg_file"; path: string }
	| { kind: "inside_toolchain"; path: string }

export function formatOverrideReason(reason: OverrideReason): string {
	switch (reason.kind) {
		case "environment":
			return `environment override by ${TOOLCHAIN_ENV}`
		case "override_db":
			return `directory override for '${reason.path}'`
		case "toolchain_file":
		case "leanpkg_file":
			return `overridden by '${reason.path}'`
		case "inside_toolchain":
			return `current directory is inside toolchain '${reason.path}'`
	}
}
