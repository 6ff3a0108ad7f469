/**
 * Unit tests for MangaBuddy listing
 *
 * Parsers run against hand-written fixtures; page fetches go through an
 * in-memory TextFetcher.
 */

import { describe, it, expect } from "vitest"
import {
	BASE_URL,
	ListingError,
	chapterNumberFromTitle,
	extractBookId,
	extractSeriesSlug,
	getSeriesDetails,
	listChapterImages,
	parseChapterImages,
	parseChapterList,
	parseSeriesMetadata,
	type TextFetcher,
} from "../../src/scraper.js"
import {
	CHAPTER_LIST_HTML,
	CHAPTER_PAGE_HTML,
	SERIES_HTML,
	SERIES_HTML_NO_BOOK_ID,
} from "../fixtures/mangabuddy.js"
import { recordingReporter } from "../helpers/index.js"

const SERIES_URL = `${BASE_URL}/test-series`
const API_URL = `${BASE_URL}/api/manga/4242/chapters?source=detail`

function fakeFetcher(pages: Record<string, string>): TextFetcher & {
	requests: { url: string; headers: Record<string, string> }[]
} {
	const requests: { url: string; headers: Record<string, string> }[] = []
	const fetcher: TextFetcher = async (url, headers) => {
		requests.push({ url, headers })
		const page = pages[url]
		if (page === undefined) {
			throw new Error("HTTP 404: Not Found")
		}
		return page
	}
	return Object.assign(fetcher, { requests })
}

describe("extractSeriesSlug", () => {
	it("takes the first path segment", () => {
		expect(extractSeriesSlug("https://mangabuddy.com/test-series")).toBe("test-series")
		expect(
			extractSeriesSlug("https://mangabuddy.com/test-series/chapter-3?page=2"),
		).toBe("test-series")
		expect(extractSeriesSlug("  test-series/chapter-1 ")).toBe("test-series")
	})

	it("returns an empty string when there is no path", () => {
		expect(extractSeriesSlug("https://mangabuddy.com/")).toBe("")
		expect(extractSeriesSlug("   ")).toBe("")
	})
})

describe("parseSeriesMetadata", () => {
	it("reads title, summary, authors and genres", () => {
		expect(parseSeriesMetadata(SERIES_HTML, SERIES_URL)).toEqual({
			Title: "Test Series",
			Series: "Test Series",
			Web: SERIES_URL,
			Manga: "Yes",
			Summary: "First line. Second line.",
			Writer: "Jane Doe",
			Genre: "Action, Comedy",
		})
	})

	it("falls back to an unknown title without a detail box", () => {
		expect(parseSeriesMetadata("<html><body></body></html>", SERIES_URL)).toEqual({
			Title: "Unknown Title",
			Series: "Unknown Title",
			Web: SERIES_URL,
			Manga: "Yes",
		})
	})
})

describe("extractBookId", () => {
	it("reads the numeric id", () => {
		expect(extractBookId(SERIES_HTML)).toBe("4242")
		expect(extractBookId(SERIES_HTML_NO_BOOK_ID)).toBeNull()
	})
})

describe("chapterNumberFromTitle", () => {
	it("parses integer and decimal numbers, case-insensitively", () => {
		expect(chapterNumberFromTitle("Chapter 12")).toBe(12)
		expect(chapterNumberFromTitle("chapter 12.5: The End")).toBe(12.5)
	})

	it("sorts unnumbered titles last", () => {
		expect(chapterNumberFromTitle("Prologue")).toBe(Infinity)
		expect(chapterNumberFromTitle("Chapter 1.2.3")).toBe(Infinity)
	})
})

describe("parseChapterList", () => {
	it("keeps linked titled chapters sorted by number", () => {
		expect(parseChapterList(CHAPTER_LIST_HTML)).toEqual([
			{ name: "Chapter 1.5", url: `${BASE_URL}/test-series/chapter-1-5` },
			{ name: "Chapter 2", url: `${BASE_URL}/test-series/chapter-2` },
			{ name: "Chapter 10", url: `${BASE_URL}/test-series/chapter-10` },
			{ name: "Side Story", url: `${BASE_URL}/test-series/extra` },
		])
	})

	it("keeps page order among chapters with the same number", () => {
		const html = `<ul>
			<li><a href="/s/b"><strong class="chapter-title">Extra B</strong></a></li>
			<li><a href="/s/a"><strong class="chapter-title">Extra A</strong></a></li>
		</ul>`
		expect(parseChapterList(html).map(c => c.name)).toEqual(["Extra B", "Extra A"])
	})
})

describe("parseChapterImages", () => {
	it("splits the list, drops blanks and strips query strings", () => {
		expect(parseChapterImages(CHAPTER_PAGE_HTML)).toEqual([
			"https://cdn.test/a/01.jpg",
			"https://cdn.test/a/02.webp",
			"https://cdn.test/a/03.png",
		])
	})

	it("returns nothing when the page has no image list", () => {
		expect(parseChapterImages("<html></html>")).toEqual([])
	})
})

describe("getSeriesDetails", () => {
	it("fetches the series page and the chapter API with the right headers", async () => {
		const fetcher = fakeFetcher({
			[SERIES_URL]: SERIES_HTML,
			[API_URL]: CHAPTER_LIST_HTML,
		})

		const details = await getSeriesDetails(`${SERIES_URL}/chapter-2`, {
			timeoutMs: 1000,
			fetchText: fetcher,
		})

		expect(details.metadata.Title).toBe("Test Series")
		expect(details.metadata.Web).toBe(SERIES_URL)
		expect(details.chapters.map(c => c.name)).toEqual([
			"Chapter 1.5",
			"Chapter 2",
			"Chapter 10",
			"Side Story",
		])
		expect(fetcher.requests.map(r => r.url)).toEqual([SERIES_URL, API_URL])
		expect(fetcher.requests[0]?.headers["Referer"]).toBe(BASE_URL)
		expect(fetcher.requests[1]?.headers["X-Requested-With"]).toBe("XMLHttpRequest")
		expect(fetcher.requests[1]?.headers["Referer"]).toBe(BASE_URL)
	})

	it("returns metadata with no chapters when the book id is missing", async () => {
		const reporter = recordingReporter()
		const fetcher = fakeFetcher({ [SERIES_URL]: SERIES_HTML_NO_BOOK_ID })

		const details = await getSeriesDetails(SERIES_URL, {
			timeoutMs: 1000,
			fetchText: fetcher,
			reporter,
		})

		expect(details.chapters).toEqual([])
		expect(details.metadata.Title).toBe("Test Series")
		expect(reporter.of("error")).toEqual(["Could not find bookId on the series page."])
		expect(fetcher.requests).toHaveLength(1)
	})

	it("raises ListingError when the series page cannot be fetched", async () => {
		const fetcher = fakeFetcher({})

		await expect(
			getSeriesDetails(SERIES_URL, { timeoutMs: 1000, fetchText: fetcher }),
		).rejects.toThrow(
			new ListingError(`Error fetching ${SERIES_URL}: HTTP 404: Not Found`),
		)
	})

	it("raises ListingError when the chapter API fails", async () => {
		const fetcher = fakeFetcher({ [SERIES_URL]: SERIES_HTML })

		await expect(
			getSeriesDetails(SERIES_URL, { timeoutMs: 1000, fetchText: fetcher }),
		).rejects.toBeInstanceOf(ListingError)
	})

	it("rejects a URL without a series slug before any request", async () => {
		const fetcher = fakeFetcher({})

		await expect(
			getSeriesDetails("https://mangabuddy.com/", {
				timeoutMs: 1000,
				fetchText: fetcher,
			}),
		).rejects.toThrow("Not a series URL: https://mangabuddy.com/")
		expect(fetcher.requests).toEqual([])
	})
})

describe("listChapterImages", () => {
	const chapterUrl = `${SERIES_URL}/chapter-2`

	it("lists the chapter's images", async () => {
		const fetcher = fakeFetcher({ [chapterUrl]: CHAPTER_PAGE_HTML })

		const images = await listChapterImages(chapterUrl, {
			timeoutMs: 1000,
			fetchText: fetcher,
		})

		expect(images).toHaveLength(3)
		expect(fetcher.requests[0]?.headers["Referer"]).toBe(BASE_URL)
	})

	it("distinguishes a failed fetch (ListingError) from an empty listing", async () => {
		const empty = fakeFetcher({ [chapterUrl]: "<html></html>" })
		await expect(
			listChapterImages(chapterUrl, { timeoutMs: 1000, fetchText: empty }),
		).resolves.toEqual([])

		const failing = fakeFetcher({})
		await expect(
			listChapterImages(chapterUrl, { timeoutMs: 1000, fetchText: failing }),
		).rejects.toBeInstanceOf(ListingError)
	})
})
