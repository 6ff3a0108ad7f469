/**
 * Series download driver
 *
 * Lists a series, runs each selected chapter as a batch and writes the
 * chapter's ComicInfo.xml. All chapter batches share one image gate, so
 * the configured image concurrency holds for the whole run even when
 * several chapters are in flight.
 */

import type { Sleep, Transport } from "../download.js"
import { ConcurrencyGate } from "../gate.js"
import { log } from "../logger.js"
import { chapterMetadata, writeComicInfo } from "../metadata.js"
import { createSpinner, runParallel } from "../parallel.js"
import { chapterDirectory, seriesDirectory } from "../paths.js"
import { createProgressSink, type ProgressSink } from "../progress.js"
import {
	getSeriesDetails,
	listChapterImages,
	type TextFetcher,
} from "../scraper.js"
import { selectChapters, type PositionRange } from "../selection.js"
import { silentReporter, type Reporter } from "../ui.js"
import type { ChapterRef, SeriesDetails } from "../types.js"
import { downloadChapterImages } from "./batch.js"
import type { ChapterResult, SeriesSummary } from "./types.js"

export interface SeriesDownloadOptions {
	/** Root directory; the series gets a sanitized subdirectory */
	outputDir: string
	/** Simultaneous image fetches across all chapters */
	jobs: number
	/** Chapters processed at the same time */
	chapterJobs: number
	retries: number
	timeoutMs: number
	retryDelayMs?: number | undefined
	maxRetryDelayMs?: number | undefined
	resume: boolean
	/** Write ComicInfo.xml into each downloaded chapter */
	metadata: boolean
	selection?: PositionRange[] | undefined
	quiet: boolean
	reporter?: Reporter | undefined
	/** Shared sink; a terminal one is created (and stopped) when absent */
	progress?: ProgressSink | undefined
	fetchText?: TextFetcher | undefined
	transport?: Transport | undefined
	sleep?: Sleep | undefined
}

/**
 * Fetch series details behind a spinner.
 *
 * @throws ListingError when the series cannot be listed
 */
export async function fetchSeries(
	url: string,
	options: Pick<
		SeriesDownloadOptions,
		"timeoutMs" | "quiet" | "reporter" | "fetchText"
	>,
): Promise<SeriesDetails> {
	const spinner = createSpinner("Fetching series details", options.quiet)
	try {
		const details = await getSeriesDetails(url, {
			timeoutMs: options.timeoutMs,
			fetchText: options.fetchText,
			reporter: options.reporter,
		})
		spinner?.succeed(
			`${details.metadata.Title ?? "Unknown Title"}: ${details.chapters.length} chapters`,
		)
		return details
	} catch (err) {
		spinner?.fail("Could not fetch series details")
		throw err
	}
}

export async function downloadSeries(
	url: string,
	options: SeriesDownloadOptions,
): Promise<SeriesSummary> {
	const startTime = Date.now()
	const reporter = options.reporter ?? silentReporter

	const details = await fetchSeries(url, options)
	const seriesTitle = details.metadata.Title ?? "Unknown Title"
	const chapters = options.selection
		? selectChapters(details.chapters, options.selection)
		: details.chapters

	if (chapters.length === 0) {
		reporter.warn(`No chapters to download for ${seriesTitle}.`)
	}

	const gate = new ConcurrencyGate(options.jobs)
	const ownedProgress = options.progress
		? null
		: createProgressSink({ quiet: options.quiet })
	const progress = options.progress ?? ownedProgress ?? undefined

	const downloadChapter = async (
		chapter: ChapterRef,
	): Promise<ChapterResult> => {
		const destDir = chapterDirectory(options.outputDir, seriesTitle, chapter.name)
		reporter.info(`Downloading chapter: ${chapter.name}`)

		const batch = await downloadChapterImages(chapter, {
			destDir,
			referer: chapter.url,
			label: chapter.name,
			gate,
			concurrency: options.jobs,
			retries: options.retries,
			timeoutMs: options.timeoutMs,
			retryDelayMs: options.retryDelayMs,
			maxRetryDelayMs: options.maxRetryDelayMs,
			resume: options.resume,
			progress,
			reporter,
			transport: options.transport,
			sleep: options.sleep,
			listImages: chapterUrl =>
				listChapterImages(chapterUrl, {
					timeoutMs: options.timeoutMs,
					fetchText: options.fetchText,
				}),
		})

		if (batch.status !== "completed") {
			return { chapter, batch, metadataPath: null }
		}

		let metadataPath: string | null = null
		if (options.metadata) {
			try {
				metadataPath = await writeComicInfo(
					destDir,
					chapterMetadata(details.metadata, chapter),
				)
			} catch (err) {
				const reason = err instanceof Error ? err.message : String(err)
				reporter.error(`Could not write metadata for ${chapter.name}: ${reason}`)
				log.batch.warn({ destDir, err }, "ComicInfo.xml write failed")
			}
		}

		const failed = batch.outcomes.filter(ok => !ok).length
		if (failed === 0) {
			reporter.success(`Finished downloading ${chapter.name}`)
		} else {
			reporter.warn(
				`Finished ${chapter.name} with ${failed}/${batch.outcomes.length} images missing`,
			)
		}
		return { chapter, batch, metadataPath }
	}

	let results: ChapterResult[]
	try {
		const run = await runParallel(chapters, downloadChapter, {
			concurrency: options.chapterJobs,
			label: "Chapters",
		})

		// Only filesystem errors outside a batch land here (e.g. mkdir failed)
		const failedByIndex = new Map(run.failed.map(f => [f.index, f] as const))
		const doneByIndex = new Map(run.success.map(s => [s.index, s.value] as const))
		results = chapters.map((chapter, index): ChapterResult => {
			const done = doneByIndex.get(index)
			if (done) return done
			const reason = failedByIndex.get(index)?.error ?? "unknown error"
			reporter.error(`${chapter.name} failed: ${reason}`)
			return {
				chapter,
				batch: {
					status: "skipped",
					destDir: chapterDirectory(options.outputDir, seriesTitle, chapter.name),
					reason,
				},
				metadataPath: null,
			}
		})
	} finally {
		ownedProgress?.stop()
	}

	let imagesSucceeded = 0
	let imagesFailed = 0
	let chaptersSkipped = 0
	for (const { batch } of results) {
		if (batch.status === "completed") {
			const ok = batch.outcomes.filter(Boolean).length
			imagesSucceeded += ok
			imagesFailed += batch.outcomes.length - ok
		} else {
			chaptersSkipped++
		}
	}

	const summary: SeriesSummary = {
		metadata: details.metadata,
		seriesDir: seriesDirectory(options.outputDir, seriesTitle),
		chapters: results,
		imagesSucceeded,
		imagesFailed,
		chaptersSkipped,
		durationMs: Date.now() - startTime,
	}
	log.batch.info(
		{
			series: seriesTitle,
			chapters: results.length,
			imagesSucceeded,
			imagesFailed,
			chaptersSkipped,
			durationMs: summary.durationMs,
		},
		"series complete",
	)
	return summary
}
