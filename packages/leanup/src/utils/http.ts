import { open } from "node:fs/promises"
import { ioFailure } from "../core/io/types.js"
import type { IoError, NetworkError, Result } from "../core/types/errors.js"
import { formatError, toError } from "./errors.js"
import { fetchWithRetry, NO_RETRY, type RetryPolicy } from "./fetch.js"

export type DownloadEvent =
	| { type: "content_length"; bytes: number }
	| { type: "data_received"; bytes: number }

export type DownloadError = NetworkError | IoError

/**
 * The two transport capabilities the core needs. Swapped for an in-process
 * fake in tests.
 */
export interface HttpClient {
	fetchText(url: string): Promise<Result<string, NetworkError>>
	download(
		url: string,
		destination: string,
		onEvent: (event: DownloadEvent) => void,
	): Promise<Result<void, DownloadError>>
}

const USER_AGENT = "leanup"

export const DEFAULT_DOWNLOAD_RETRY: RetryPolicy = { attempts: 3, delayMs: 1000 }

export interface FetchHttpClientOptions {
	/**
	 * Retries for archive downloads. Release and asset queries are tried once,
	 * so a failed channel lookup falls back to installed releases right away.
	 */
	downloadRetry?: RetryPolicy
}

export class FetchHttpClient implements HttpClient {
	private readonly downloadRetry: RetryPolicy

	constructor(options: FetchHttpClientOptions = {}) {
		this.downloadRetry = options.downloadRetry ?? DEFAULT_DOWNLOAD_RETRY
	}

	async fetchText(url: string): Promise<Result<string, NetworkError>> {
		const response = await this.get(url, NO_RETRY)
		if (!response.ok) {
			return response
		}

		try {
			return { ok: true, value: await response.value.text() }
		} catch (error) {
			return networkFailure(`Failed to read response from ${url}`, url, error)
		}
	}

	async download(
		url: string,
		destination: string,
		onEvent: (event: DownloadEvent) => void,
	): Promise<Result<void, DownloadError>> {
		const response = await this.get(url, this.downloadRetry)
		if (!response.ok) {
			return response
		}

		const body = response.value.body
		if (!body) {
			return {
				error: { message: `Empty response body from ${url}`, type: "network", url },
				ok: false,
			}
		}

		const contentLength = Number(response.value.headers.get("content-length"))
		if (Number.isFinite(contentLength) && contentLength > 0) {
			onEvent({ bytes: contentLength, type: "content_length" })
		}

		let handle: Awaited<ReturnType<typeof open>>
		try {
			handle = await open(destination, "w")
		} catch (error) {
			return ioFailure(error, destination, "open")
		}

		const reader = body.getReader()
		try {
			while (true) {
				const { done, value } = await reader.read()
				if (done) break
				await handle.write(value)
				onEvent({ bytes: value.byteLength, type: "data_received" })
			}
		} catch (error) {
			return networkFailure(`Download of ${url} was interrupted`, url, error)
		} finally {
			await handle.close()
		}

		return { ok: true, value: undefined }
	}

	private async get(url: string, retry: RetryPolicy): Promise<Result<Response, NetworkError>> {
		let response: Response
		try {
			response = await fetchWithRetry(
				url,
				{ headers: { "User-Agent": USER_AGENT }, redirect: "follow" },
				retry,
			)
		} catch (error) {
			return networkFailure(`Could not connect to ${url}: ${formatError(error)}`, url, error)
		}

		if (!response.ok) {
			const message =
				response.status >= 400 && response.status < 500
					? `download does not exist: ${url}`
					: `HTTP ${response.status} for ${url}`
			return {
				error: { message, status: response.status, type: "network", url },
				ok: false,
			}
		}

		return { ok: true, value: response }
	}
}

function networkFailure<T>(
	message: string,
	url: string,
	error: unknown,
): Result<T, NetworkError> {
	return {
		error: { message, rawError: toError(error), type: "network", url },
		ok: false,
	}
}
