import { createReadStream, createWriteStream } from "node:fs"
import { chmod, mkdir } from "node:fs/promises"
import path from "node:path"
import { Transform } from "node:stream"
import { pipeline } from "node:stream/promises"
import { Decompress } from "fzstd"
import * as tar from "tar"
import yauzl from "yauzl"
import { formatError, toError } from "../../utils/errors.js"
import type { ExtractionError, Result, UnsupportedArchiveError } from "../types/errors.js"

export type ArchiveFormat = "tar.gz" | "tar.zst" | "zip"

export type ExtractResult = Result<void, ExtractionError | UnsupportedArchiveError>

export function archiveFormat(fileName: string): ArchiveFormat | null {
	const lower = fileName.toLowerCase()
	if (lower.endsWith(".tar.gz") || lower.endsWith(".tgz")) return "tar.gz"
	if (lower.endsWith(".tar.zst")) return "tar.zst"
	if (lower.endsWith(".zip")) return "zip"
	return null
}

/**
 * Extract an archive into destDir, dropping the archive's top-level directory.
 * The format is chosen from the suffix of `fileName` (the published asset name).
 */
export async function extractArchive(
	archivePath: string,
	destDir: string,
	fileName: string = path.basename(archivePath),
): Promise<ExtractResult> {
	const format = archiveFormat(fileName)
	if (!format) {
		return {
			error: {
				message: `unsupported archive format: '${fileName}' (expected .tar.gz, .tar.zst or .zip)`,
				path: archivePath,
				type: "unsupported_archive",
			},
			ok: false,
		}
	}

	try {
		await mkdir(destDir, { recursive: true })
		switch (format) {
			case "tar.gz":
				await tar.extract({ cwd: destDir, file: archivePath, strip: 1 })
				break
			case "tar.zst":
				await extractTarZst(archivePath, destDir)
				break
			case "zip":
				await extractZip(archivePath, destDir)
				break
		}
	} catch (error) {
		return {
			error: {
				message: `failed to extract ${archivePath}: ${formatError(error)}`,
				path: archivePath,
				rawError: toError(error),
				type: "extraction",
			},
			ok: false,
		}
	}

	return { ok: true, value: undefined }
}

function extractTarZst(archivePath: string, destDir: string): Promise<void> {
	return pipeline(
		createReadStream(archivePath),
		zstdDecompressStream(),
		tar.extract({ cwd: destDir, strip: 1 }),
	)
}

/**
 * Transform stream over fzstd's incremental decoder. The last input chunk is
 * held back so it can be pushed with the final flag.
 */
function zstdDecompressStream(): Transform {
	let pending: Uint8Array | null = null

	const stream = new Transform({
		flush(callback) {
			try {
				decoder.push(pending ?? new Uint8Array(0), true)
				callback()
			} catch (error) {
				callback(toError(error))
			}
		},
		transform(chunk: Buffer, _encoding, callback) {
			try {
				if (pending) {
					decoder.push(pending)
				}
				pending = chunk
				callback()
			} catch (error) {
				callback(toError(error))
			}
		},
	})

	// Output chunks are views into the decoder's window, so copy them
	const decoder = new Decompress((data) => {
		stream.push(Buffer.from(data))
	})

	return stream
}

/**
 * Path of a zip entry below destDir with its first component removed, or null
 * for the top-level directory itself.
 */
function strippedEntryPath(destDir: string, fileName: string): string | null {
	const parts = fileName.split("/").slice(1)
	if (parts.every((part) => part.length === 0)) {
		return null
	}

	const target = path.resolve(destDir, ...parts)
	if (!target.startsWith(path.resolve(destDir) + path.sep)) {
		throw new Error(`path traversal detected in archive: ${fileName}`)
	}
	return target
}

function extractZip(archivePath: string, destDir: string): Promise<void> {
	return new Promise((resolve, reject) => {
		yauzl.open(archivePath, { lazyEntries: true }, (openError, zipfile) => {
			if (openError || !zipfile) {
				reject(openError ?? new Error(`failed to open ${archivePath}`))
				return
			}

			const fail = (error: unknown) => {
				zipfile.close()
				reject(error)
			}

			zipfile.on("entry", (entry: yauzl.Entry) => {
				let target: string | null
				try {
					target = strippedEntryPath(destDir, entry.fileName)
				} catch (error) {
					fail(error)
					return
				}

				if (target === null) {
					zipfile.readEntry()
					return
				}

				if (entry.fileName.endsWith("/")) {
					mkdir(target, { recursive: true })
						.then(() => zipfile.readEntry())
						.catch(fail)
					return
				}

				const filePath = target
				mkdir(path.dirname(filePath), { recursive: true })
					.then(() => {
						zipfile.openReadStream(entry, (streamError, readStream) => {
							if (streamError || !readStream) {
								fail(streamError ?? new Error(`failed to read ${entry.fileName}`))
								return
							}

							pipeline(readStream, createWriteStream(filePath))
								.then(async () => {
									// Unix mode lives in the upper 16 bits
									const mode = (entry.externalFileAttributes >>> 16) & 0o777
									if (mode !== 0) {
										await chmod(filePath, mode)
									}
								})
								.then(() => zipfile.readEntry())
								.catch(fail)
						})
					})
					.catch(fail)
			})

			zipfile.on("end", () => resolve())
			zipfile.on("error", fail)
			zipfile.readEntry()
		})
	})
}
