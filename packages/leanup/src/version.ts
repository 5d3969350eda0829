export const LEANUP_VERSION = "0.1.0"
