import { type Cfg, createCfg } from "../core/config.js"
import type { Result, ValidationError } from "../core/types/errors.js"
import { type LeanupEnv, readEnv } from "../env.js"
import { FetchHttpClient } from "../utils/http.js"
import { TerminalSink } from "./notify.js"

export interface Session {
	cfg: Cfg
	env: LeanupEnv
}

/**
 * Build the per-invocation session from the process environment.
 */
export function createSession(): Result<Session, ValidationError> {
	const env = readEnv()
	if (!env.ok) {
		return env
	}

	const cfg = createCfg({
		envOverride: env.value.toolchainOverride,
		homeDir: env.value.homeDir,
		http: new FetchHttpClient(),
		notify: new TerminalSink(),
		offline: env.value.offline,
	})
	return { ok: true, value: { cfg, env: env.value } }
}
