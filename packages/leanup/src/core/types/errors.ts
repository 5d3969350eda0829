import type { ZodError } from "zod"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type InvalidNameError = BaseError & {
	type: "invalid_name"
	target: string
}

export type NetworkError = BaseError & {
	type: "network"
	url?: string
	status?: number
}

export type UnsupportedChannelError = BaseError & {
	type: "unsupported_channel"
	channel: string
	origin: string
}

export type AssetNotFoundError = BaseError & {
	type: "asset_not_found"
	platform: string
	target: string
}

export type UnsupportedArchiveError = BaseError & {
	type: "unsupported_archive"
	path: string
}

export type ExtractionError = BaseError & {
	type: "extraction"
	path: string
}

export type AlreadyInstalledError = BaseError & {
	type: "already_installed"
	path: string
	target: string
}

export type NotInstalledError = BaseError & {
	type: "not_installed"
	path: string
	target?: string
}

export type InvalidConfigError = BaseError & {
	type: "invalid_config"
	path: string
	source: "pin_file" | "leanpkg" | "settings" | "release_feed"
	zodError?: ZodError
}

export type IoError = BaseError & {
	type: "io"
	path: string
	operation: string
}

export type RecursionLimitError = BaseError & {
	type: "recursion_limit"
	target: string
}

export type NoDefaultToolchainError = BaseError & {
	type: "no_default_toolchain"
}

export type BinaryNotFoundError = BaseError & {
	type: "binary_not_found"
	path: string
	target: string
}

export type ValidationError = BaseError & {
	type: "validation"
	field: string
	source: "zod" | "manual"
	zodError?: ZodError
}

export type LeanupError =
	| InvalidNameError
	| NetworkError
	| UnsupportedChannelError
	| AssetNotFoundError
	| UnsupportedArchiveError
	| ExtractionError
	| AlreadyInstalledError
	| NotInstalledError
	| InvalidConfigError
	| IoError
	| RecursionLimitError
	| NoDefaultToolchainError
	| BinaryNotFoundError
	| ValidationError

export type Result<T, E extends BaseError = LeanupError> =
	| { ok: true; value: T }
	| { ok: false; error: E }

/**
 * Re-label an error with a higher-level message, keeping the original as cause.
 */
export function withContext<E extends LeanupError>(error: E, message: string): E {
	const cause: BaseError = error
	return { ...error, cause, message, rawError: undefined }
}
