import type { IoError, Result } from "../types/errors.js"
import { toError } from "../../utils/errors.js"

export type IoResult<T> = Result<T, IoError>

export function ioFailure<T>(
	error: unknown,
	path: string,
	operation: string,
): IoResult<T> {
	const rawError = toError(error)
	return {
		error: {
			message: `Failed to ${operation} ${path}: ${rawError.message}`,
			operation,
			path,
			rawError,
			type: "io",
		},
		ok: false,
	}
}
