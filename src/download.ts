/**
 * Single-image download with retry
 *
 * - Whole payload written to a .part file, then renamed into place
 * - Exponential backoff between attempts (2^attempt units, no jitter)
 * - Failures never throw: each one ends as `false` plus a notice
 */

import { existsSync, unlinkSync } from "node:fs"
import { rename, stat, writeFile } from "node:fs/promises"
import { buildHeaders, fetchBytes } from "./http.js"
import { log } from "./logger.js"
import { silentReporter, type Reporter } from "./ui.js"

/**
 * Fetch one resource and return its bytes. Throws on any transport
 * failure (timeout, connection error, non-2xx status).
 */
export type Transport = (
	url: string,
	headers: Record<string, string>,
	timeoutMs: number,
) => Promise<Uint8Array>

export type Sleep = (ms: number) => Promise<void>

export interface FetchOptions {
	/** Page the images belong to; sent as Referer */
	referer: string
	/** Attempts, first try included (>= 1) */
	retries: number
	/** Per-attempt transport timeout */
	timeoutMs: number
	/** Backoff unit. Default 1000 */
	retryDelayMs?: number | undefined
	/** Ceiling on one backoff sleep. Unbounded when undefined */
	maxRetryDelayMs?: number | undefined
	transport?: Transport | undefined
	sleep?: Sleep | undefined
	reporter?: Reporter | undefined
}

export class EmptyPayloadError extends Error {
	constructor() {
		super("Empty image payload")
		this.name = "EmptyPayloadError"
	}
}

export const httpTransport: Transport = (url, headers, timeoutMs) =>
	fetchBytes(url, { headers, timeoutMs })

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Delay before the attempt following the failed attempt `attemptIndex`
 * (0-based).
 */
export function backoffDelay(
	attemptIndex: number,
	unitMs: number,
	maxMs?: number,
): number {
	const delay = 2 ** attemptIndex * unitMs
	return maxMs === undefined ? delay : Math.min(delay, maxMs)
}

function getPartPath(destPath: string): string {
	return `${destPath}.part`
}

function cleanupPartFile(partPath: string): void {
	try {
		if (existsSync(partPath)) {
			unlinkSync(partPath)
		}
	} catch (err) {
		log.download.debug({ err, partPath }, "could not remove partial file")
	}
}

async function writeAtomic(destPath: string, data: Uint8Array): Promise<void> {
	const partPath = getPartPath(destPath)
	try {
		await writeFile(partPath, data)
		await rename(partPath, destPath)
	} catch (err) {
		cleanupPartFile(partPath)
		throw err
	}
}

/**
 * @throws RangeError unless `retries` is a positive integer
 */
export function assertRetryBudget(retries: number): void {
	if (!Number.isInteger(retries) || retries < 1) {
		throw new RangeError(`retries must be a positive integer, got ${retries}`)
	}
}

/**
 * Download `url` to `destPath`, retrying up to `options.retries` times.
 * The parent directory must already exist. Download failures never throw;
 * only an invalid retry budget does.
 *
 * @returns true when the complete payload is at `destPath`
 */
export async function fetchWithRetry(
	url: string,
	destPath: string,
	options: FetchOptions,
): Promise<boolean> {
	const {
		referer,
		retries,
		timeoutMs,
		retryDelayMs = 1000,
		maxRetryDelayMs,
		transport = httpTransport,
		sleep: wait = sleep,
		reporter = silentReporter,
	} = options
	assertRetryBudget(retries)

	for (let attempt = 0; attempt < retries; attempt++) {
		try {
			const payload = await transport(url, buildHeaders(referer), timeoutMs)
			if (payload.byteLength === 0) {
				throw new EmptyPayloadError()
			}

			await writeAtomic(destPath, payload)
			log.download.debug(
				{ url, destPath, bytes: payload.byteLength, attempt: attempt + 1 },
				"image saved",
			)
			return true
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err)
			reporter.warn(`Attempt ${attempt + 1}/${retries} failed for ${url}: ${reason}`)
			log.download.debug({ url, attempt: attempt + 1, err }, "attempt failed")

			if (attempt < retries - 1) {
				await wait(backoffDelay(attempt, retryDelayMs, maxRetryDelayMs))
			}
		}
	}

	reporter.error(`Failed to download image from ${url} after ${retries} attempts.`)
	log.download.warn({ url, destPath, retries }, "retries exhausted")
	return false
}

/**
 * True when a non-empty file already sits at `destPath` (resume mode)
 */
export async function isDownloaded(destPath: string): Promise<boolean> {
	try {
		const { size } = await stat(destPath)
		return size > 0
	} catch {
		return false
	}
}
