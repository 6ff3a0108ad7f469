/**
 * MangaBuddy series and chapter listing
 *
 * Reads series metadata from the series page, the chapter list from the
 * site's chapter API, and image URLs from the `chapImages` variable that
 * each chapter page embeds.
 */

import * as cheerio from "cheerio"
import { buildHeaders, fetchText } from "./http.js"
import { log } from "./logger.js"
import { silentReporter, type Reporter } from "./ui.js"
import type { ChapterRef, ComicMetadata, SeriesDetails } from "./types.js"

export const BASE_URL = "https://mangabuddy.com"

/**
 * Listing failed (network error, bad status, unusable URL). Callers treat
 * this as "batch skipped", distinct from an empty listing.
 */
export class ListingError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = "ListingError"
	}
}

/** Fetch a page as text; throws on transport failure or non-2xx status */
export type TextFetcher = (
	url: string,
	headers: Record<string, string>,
	timeoutMs: number,
) => Promise<string>

export interface ScraperOptions {
	timeoutMs: number
	fetchText?: TextFetcher | undefined
	reporter?: Reporter | undefined
}

const httpTextFetcher: TextFetcher = (url, headers, timeoutMs) =>
	fetchText(url, { headers, timeoutMs })

function normalizeSpace(text: string): string {
	return text.replace(/\s+/g, " ").trim()
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

/**
 * First path segment of a series URL, or "" when there is none.
 *
 * @example
 * extractSeriesSlug("https://mangabuddy.com/some-series/chapter-3") // "some-series"
 */
export function extractSeriesSlug(url: string): string {
	const trimmed = url.trim()
	let path: string
	try {
		path = new URL(trimmed).pathname
	} catch {
		path = trimmed
	}
	const segments = path.split("/").filter(Boolean)
	return segments[0] ?? ""
}

export function parseSeriesMetadata(
	html: string,
	pageUrl: string,
): ComicMetadata {
	const $ = cheerio.load(html)
	const title =
		normalizeSpace($("div.name.box h1").first().text()) || "Unknown Title"

	const metadata: ComicMetadata = {
		Title: title,
		Web: pageUrl,
		Series: title,
		Manga: "Yes",
	}

	const detailBox = $("div.detail-box").first()
	if (detailBox.length === 0) {
		return metadata
	}

	const summary = normalizeSpace(detailBox.find("div.summary").first().text())
	if (summary) {
		metadata.Summary = summary
	}

	detailBox.find("p").each((_, el) => {
		const paragraph = $(el)
		const strong = paragraph.find("strong").first()
		if (strong.length === 0) return

		const labelText = normalizeSpace(strong.text())
		const key = labelText.replace(/:/g, "")
		const value = normalizeSpace(paragraph.text())
			.replace(labelText, "")
			.replace(/^[\s:]+|[\s:]+$/g, "")

		if (key === "Author(s)") {
			metadata.Writer = value
		} else if (key === "Genre(s)") {
			metadata.Genre = value
		}
	})

	return metadata
}

export function extractBookId(html: string): string | null {
	const match = html.match(/var\s+bookId\s*=\s*(\d+);/)
	return match?.[1] ?? null
}

/**
 * Number from a "Chapter N" title; Infinity when absent so such chapters
 * sort last.
 */
export function chapterNumberFromTitle(title: string): number {
	const match = title.match(/Chapter\s+([\d.]+)/i)
	if (!match?.[1]) return Infinity
	const value = Number(match[1])
	return Number.isNaN(value) ? Infinity : value
}

function absoluteChapterUrl(href: string): string {
	if (href.startsWith("http")) return href
	return `${BASE_URL}${href.startsWith("/") ? href : `/${href}`}`
}

/**
 * Parse the chapter API fragment into chapters sorted by number, keeping
 * page order among equal or missing numbers.
 */
export function parseChapterList(html: string): ChapterRef[] {
	const $ = cheerio.load(html)
	const rows: { name: string; url: string; number: number; index: number }[] =
		[]

	$("li").each((index, el) => {
		const item = $(el)
		const link = item.find("a").first()
		const strong = item.find("strong.chapter-title").first()
		if (link.length === 0 || strong.length === 0) return

		const href = (link.attr("href") ?? "").trim()
		if (!href) return

		const name = strong.text().trim()
		rows.push({
			name,
			url: absoluteChapterUrl(href),
			number: chapterNumberFromTitle(name),
			index,
		})
	})

	rows.sort((a, b) => {
		if (a.number !== b.number) return a.number < b.number ? -1 : 1
		return a.index - b.index
	})
	return rows.map(({ name, url }) => ({ name, url }))
}

/**
 * Image URLs from `var chapImages = '...'`, query strings removed.
 * Empty when the variable is missing.
 */
export function parseChapterImages(html: string): string[] {
	const match = html.match(/var\s+chapImages\s*=\s*['"]([^'"]+)['"]/)
	if (!match?.[1]) return []

	return match[1]
		.split(",")
		.map(image => image.trim())
		.filter(image => image.length > 0)
		.map(image => image.replace(/\?.*$/, ""))
}

/**
 * Fetch series metadata and its ordered chapter list.
 *
 * @throws ListingError when the URL has no series slug or a request fails
 */
export async function getSeriesDetails(
	url: string,
	options: ScraperOptions,
): Promise<SeriesDetails> {
	const { timeoutMs, fetchText: get = httpTextFetcher } = options
	const reporter = options.reporter ?? silentReporter

	const slug = extractSeriesSlug(url)
	if (!slug) {
		throw new ListingError(`Not a series URL: ${url}`)
	}
	const seriesUrl = `${BASE_URL}/${slug}`

	let detailHtml: string
	try {
		detailHtml = await get(seriesUrl, buildHeaders(BASE_URL), timeoutMs)
	} catch (err) {
		throw new ListingError(`Error fetching ${seriesUrl}: ${describe(err)}`, {
			cause: err,
		})
	}

	const metadata = parseSeriesMetadata(detailHtml, seriesUrl)
	const bookId = extractBookId(detailHtml)
	if (!bookId) {
		reporter.error("Could not find bookId on the series page.")
		log.scrape.warn({ seriesUrl }, "bookId missing")
		return { metadata, chapters: [] }
	}

	const apiUrl = `${BASE_URL}/api/manga/${bookId}/chapters?source=detail`
	let chapterHtml: string
	try {
		chapterHtml = await get(
			apiUrl,
			buildHeaders(BASE_URL, { "X-Requested-With": "XMLHttpRequest" }),
			timeoutMs,
		)
	} catch (err) {
		throw new ListingError(
			`Error fetching chapter list for ${seriesUrl}: ${describe(err)}`,
			{ cause: err },
		)
	}

	const chapters = parseChapterList(chapterHtml)
	log.scrape.debug(
		{ seriesUrl, bookId, chapters: chapters.length },
		"series listed",
	)
	return { metadata, chapters }
}

/**
 * Image URLs of one chapter, in reading order.
 *
 * @throws ListingError when the chapter page cannot be fetched
 */
export async function listChapterImages(
	chapterUrl: string,
	options: ScraperOptions,
): Promise<string[]> {
	const { timeoutMs, fetchText: get = httpTextFetcher } = options
	let html: string
	try {
		html = await get(chapterUrl, buildHeaders(BASE_URL), timeoutMs)
	} catch (err) {
		throw new ListingError(
			`Error fetching chapter page ${chapterUrl}: ${describe(err)}`,
			{ cause: err },
		)
	}

	const images = parseChapterImages(html)
	log.scrape.debug({ chapterUrl, images: images.length }, "chapter listed")
	return images
}
