/**
 * Shared HTTP plumbing: one keep-alive agent, immutable base headers,
 * per-request header merging and a timed text fetch.
 */

import { Agent, fetch as undiciFetch } from "undici"

export const HTTP_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	connections: 32,
})

export const BASE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
	"User-Agent":
		"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36",
	Accept:
		"text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
})

/**
 * Copy the base headers and layer the referer and any extras on top.
 * Never mutates BASE_HEADERS.
 */
export function buildHeaders(
	referer: string,
	extra: Record<string, string> = {},
): Record<string, string> {
	return { ...BASE_HEADERS, Referer: referer, ...extra }
}

export class HttpStatusError extends Error {
	constructor(
		readonly url: string,
		readonly status: number,
		statusText: string,
	) {
		super(`HTTP ${status}${statusText ? `: ${statusText}` : ""}`)
		this.name = "HttpStatusError"
	}
}

/** Largest delay AbortSignal.timeout() accepts */
export const MAX_TIMEOUT_MS = 4_294_967_295

/**
 * Whole milliseconds in [1, MAX_TIMEOUT_MS], as the abort timer requires
 */
export function timerMs(ms: number): number {
	if (Number.isNaN(ms)) {
		throw new RangeError(`Invalid timeout: ${ms}`)
	}
	return Math.min(MAX_TIMEOUT_MS, Math.max(1, Math.round(ms)))
}

export interface RequestOptions {
	headers: Record<string, string>
	timeoutMs: number
}

/**
 * GET a URL and return its body as text. Throws on transport errors,
 * timeouts and non-2xx responses.
 */
export async function fetchText(
	url: string,
	options: RequestOptions,
): Promise<string> {
	const response = await undiciFetch(url, {
		headers: options.headers,
		dispatcher: HTTP_AGENT,
		redirect: "follow",
		signal: AbortSignal.timeout(timerMs(options.timeoutMs)),
	})
	if (!response.ok) {
		// Drain so the socket goes back to the pool
		await response.body?.cancel()
		throw new HttpStatusError(url, response.status, response.statusText)
	}
	return response.text()
}

/**
 * GET a URL and return its body as bytes. Same failure rules as fetchText.
 */
export async function fetchBytes(
	url: string,
	options: RequestOptions,
): Promise<Uint8Array> {
	const response = await undiciFetch(url, {
		headers: options.headers,
		dispatcher: HTTP_AGENT,
		redirect: "follow",
		signal: AbortSignal.timeout(timerMs(options.timeoutMs)),
	})
	if (!response.ok) {
		await response.body?.cancel()
		throw new HttpStatusError(url, response.status, response.statusText)
	}
	return new Uint8Array(await response.arrayBuffer())
}
