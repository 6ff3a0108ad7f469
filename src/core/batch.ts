/**
 * Chapter batch orchestrator
 *
 * Fans out one task per image locator, all launched at once and admitted
 * through a counting gate. Each task fetches with retry, releases its slot
 * and ticks progress whatever the outcome. A failed image never cancels
 * its siblings; the call settles once every image is terminal.
 */

import { mkdir } from "node:fs/promises"
import { join } from "node:path"

import { assertRetryBudget, fetchWithRetry, isDownloaded } from "../download.js"
import { ConcurrencyGate } from "../gate.js"
import { log } from "../logger.js"
import { pageFileName } from "../paths.js"
import { NOOP_PROGRESS } from "../progress.js"
import { ListingError } from "../scraper.js"
import { silentReporter } from "../ui.js"
import type { ChapterRef } from "../types.js"
import type { BatchOptions, BatchResult, ImageLister } from "./types.js"

/**
 * Download every locator into `options.destDir`.
 *
 * Page `i` is always written to `pageFileName(i, N, locator)`, so file
 * names follow reading order regardless of completion order.
 */
export async function runBatch(
	locators: readonly string[],
	options: BatchOptions,
): Promise<BatchResult> {
	const { destDir, label } = options
	const progress = options.progress ?? NOOP_PROGRESS
	const reporter = options.reporter ?? silentReporter

	assertRetryBudget(options.retries)
	const gate = options.gate ?? new ConcurrencyGate(options.concurrency)

	await mkdir(destDir, { recursive: true })

	const total = locators.length
	if (total === 0) {
		log.batch.info({ destDir, label }, "no images to download")
		return { status: "empty", destDir, outcomes: [] }
	}

	const handle = progress.onTaskCreated(total, label)
	const startTime = Date.now()

	const downloadOne = async (locator: string, index: number) => {
		const destPath = join(destDir, pageFileName(index, total, locator))

		await gate.acquire()
		let ok: boolean
		try {
			if (options.resume && (await isDownloaded(destPath))) {
				log.batch.debug({ destPath }, "already downloaded, skipping")
				ok = true
			} else {
				ok = await fetchWithRetry(locator, destPath, {
					referer: options.referer,
					retries: options.retries,
					timeoutMs: options.timeoutMs,
					retryDelayMs: options.retryDelayMs,
					maxRetryDelayMs: options.maxRetryDelayMs,
					transport: options.transport,
					sleep: options.sleep,
					reporter,
				})
			}
		} finally {
			gate.release()
		}

		progress.onAdvance(handle, 1)
		return ok
	}

	let outcomes: boolean[]
	try {
		outcomes = await Promise.all(locators.map(downloadOne))
	} finally {
		progress.onTaskRemoved(handle)
	}

	const succeeded = outcomes.filter(Boolean).length
	log.batch.info(
		{
			label,
			destDir,
			total,
			succeeded,
			failed: total - succeeded,
			durationMs: Date.now() - startTime,
		},
		"batch complete",
	)

	return { status: "completed", destDir, outcomes }
}

export interface ChapterBatchOptions extends BatchOptions {
	listImages: ImageLister
}

/**
 * List a chapter's images and run them as one batch. A listing failure
 * (normally a ListingError) yields `status: "skipped"` rather than an error.
 */
export async function downloadChapterImages(
	chapter: ChapterRef,
	options: ChapterBatchOptions,
): Promise<BatchResult> {
	const { destDir, listImages } = options
	const reporter = options.reporter ?? silentReporter
	assertRetryBudget(options.retries)

	let locators: string[]
	try {
		locators = await listImages(chapter.url)
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err)
		await mkdir(destDir, { recursive: true })
		reporter.error(`Could not list images for ${chapter.name}: ${reason}`)
		log.batch.warn(
			{ chapter: chapter.url, err, listingError: err instanceof ListingError },
			"chapter listing failed",
		)
		return { status: "skipped", destDir, reason }
	}

	if (locators.length === 0) {
		reporter.error(`No images found for ${chapter.name}. Skipping download.`)
	}

	return runBatch(locators, options)
}
