import path from "node:path"
import type { AbsolutePath, NonEmptyString } from "./branded.js"

/**
 * Coerce a string to NonEmptyString.
 * Trims whitespace and rejects empty strings.
 */
export function coerceNonEmpty(s: string): NonEmptyString | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

/**
 * Resolve a path that is known to be usable (cwd-relative input, joined paths).
 */
export function toAbsolutePath(...segments: string[]): AbsolutePath {
	return path.resolve(...segments) as AbsolutePath
}
