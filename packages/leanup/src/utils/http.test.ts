import { readFile } from "node:fs/promises"
import { createServer, type Server } from "node:http"
import path from "node:path"
import { afterAll, beforeAll, describe, expect, it } from "vitest"
import "../../tests/helpers/assertions.js"
import { withTempDir } from "../../tests/helpers/fs.js"
import { type DownloadEvent, FetchHttpClient } from "./http.js"

const ARCHIVE = new Uint8Array(100_000).fill(7)

let server: Server
let baseUrl: string
const userAgents: string[] = []

function listen(target: Server): Promise<number> {
	return new Promise((resolve, reject) => {
		target.once("error", reject)
		target.listen(0, "127.0.0.1", () => {
			const address = target.address()
			if (address === null || typeof address === "string") {
				reject(new Error("server has no port"))
				return
			}
			resolve(address.port)
		})
	})
}

function close(target: Server): Promise<void> {
	target.closeAllConnections()
	return new Promise((resolve, reject) => {
		target.close((error) => (error ? reject(error) : resolve()))
	})
}

beforeAll(async () => {
	server = createServer((request, response) => {
		userAgents.push(request.headers["user-agent"] ?? "")
		switch (request.url) {
			case "/feed.json":
				response.writeHead(200, { "Content-Type": "application/json" })
				response.end('{"stable":"v4.9.0"}')
				return
			case "/lean.tar.zst":
				response.writeHead(200, { "Content-Length": String(ARCHIVE.byteLength) })
				response.end(ARCHIVE)
				return
			case "/broken":
				response.writeHead(503)
				response.end()
				return
			default:
				response.writeHead(404)
				response.end()
		}
	})
	baseUrl = `http://127.0.0.1:${await listen(server)}`
})

afterAll(() => close(server))

describe("FetchHttpClient", () => {
	describe("fetchText", () => {
		it("returns the body and identifies itself", async () => {
			const client = new FetchHttpClient()

			const result = await client.fetchText(`${baseUrl}/feed.json`)

			expect(result).toEqual({ ok: true, value: '{"stable":"v4.9.0"}' })
			expect(userAgents.at(-1)).toBe("leanup")
		})

		it("reports a missing resource as a download that does not exist", async () => {
			const url = `${baseUrl}/missing`

			const result = await new FetchHttpClient().fetchText(url)

			expect(result).toEqual({
				error: {
					message: `download does not exist: ${url}`,
					status: 404,
					type: "network",
					url,
				},
				ok: false,
			})
		})

		it("reports a server error with its status", async () => {
			const url = `${baseUrl}/broken`

			const result = await new FetchHttpClient().fetchText(url)

			expect(result).toEqual({
				error: { message: `HTTP 503 for ${url}`, status: 503, type: "network", url },
				ok: false,
			})
		})

		it("fails once without retrying when nothing listens", async () => {
			const closed = createServer()
			const port = await listen(closed)
			await close(closed)
			const started = Date.now()

			const result = await new FetchHttpClient().fetchText(`http://127.0.0.1:${port}/feed.json`)

			expect(result).toBeErrOfType("network")
			expect(Date.now() - started).toBeLessThan(1000)
		})
	})

	describe("download", () => {
		it("streams the body to disk and reports progress", async () => {
			await withTempDir(async (dir) => {
				const destination = path.join(dir, "lean.tar.zst")
				const events: DownloadEvent[] = []

				const result = await new FetchHttpClient().download(
					`${baseUrl}/lean.tar.zst`,
					destination,
					(event) => events.push(event),
				)

				expect(result).toBeOk()
				expect(new Uint8Array(await readFile(destination))).toEqual(ARCHIVE)
				expect(events[0]).toEqual({ bytes: ARCHIVE.byteLength, type: "content_length" })
				const received = events
					.slice(1)
					.reduce((total, event) => total + (event.type === "data_received" ? event.bytes : 0), 0)
				expect(received).toBe(ARCHIVE.byteLength)
			})
		})

		it("does not create the destination for a missing download", async () => {
			await withTempDir(async (dir) => {
				const destination = path.join(dir, "lean.tar.zst")

				const result = await new FetchHttpClient({
					downloadRetry: { attempts: 1, delayMs: 0 },
				}).download(`${baseUrl}/gone.tar.zst`, destination, () => {})

				expect(result).toBeErrOfType("network")
				if (!result.ok && result.error.type === "network") {
					expect(result.error.status).toBe(404)
				}
				await expect(readFile(destination)).rejects.toThrow()
			})
		})
	})
})
