export * from "./core/active.js"
export * from "./core/config.js"
export * from "./core/gc/analyze.js"
export * from "./core/install/manifestation.js"
export * from "./core/notifications.js"
export * from "./core/override/database.js"
export * from "./core/override/locator.js"
export * from "./core/override/projects.js"
export * from "./core/override/reason.js"
export * from "./core/resolve/resolver.js"
export * from "./core/settings/file.js"
export * from "./core/state.js"
export * from "./core/toolchain/descriptor.js"
export * from "./core/toolchain/sort.js"
export * from "./core/toolchain/toolchain.js"
export * from "./core/types/index.js"
export * from "./utils/http.js"
