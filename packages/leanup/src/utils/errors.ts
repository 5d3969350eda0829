export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}

	return String(error)
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error))
}

/**
 * Node system error code (ENOENT, EEXIST, ...) of a thrown value, if any.
 */
export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		return typeof error.code === "string" ? error.code : undefined
	}

	return undefined
}

export function isNotFound(error: unknown): boolean {
	return errorCode(error) === "ENOENT"
}

export function isAlreadyExists(error: unknown): boolean {
	return errorCode(error) === "EEXIST"
}
