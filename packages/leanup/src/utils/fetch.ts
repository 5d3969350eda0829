import { sleep } from "./sleep.js"

export interface RetryPolicy {
	attempts: number
	delayMs: number
}

export const NO_RETRY: RetryPolicy = { attempts: 1, delayMs: 0 }

/**
 * fetch that retries connection failures with a linearly growing delay.
 * HTTP error statuses are returned as responses and never retried.
 */
export async function fetchWithRetry(
	url: string,
	init: RequestInit,
	policy: RetryPolicy,
): Promise<Response> {
	for (let attempt = 1; ; attempt += 1) {
		try {
			return await fetch(url, init)
		} catch (error) {
			if (attempt >= policy.attempts) {
				throw error
			}
			await sleep(policy.delayMs * attempt)
		}
	}
}
