/**
 * Branded Types
 *
 * Nominal string types built on brand symbols. Once a value has been coerced
 * to a branded type its validity is carried by the type system.
 *
 * Only coercion functions in ./coerce.ts should create branded values.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol

/**
 * A non-empty, trimmed string.
 */
export type NonEmptyString = string & { readonly [NonEmptyStringBrand]: true }

/**
 * An absolute, normalized filesystem path.
 */
export type AbsolutePath = string & { readonly [AbsolutePathBrand]: true }
