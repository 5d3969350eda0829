export * from "./branded.js"
export * from "./coerce.js"
export * from "./errors.js"
