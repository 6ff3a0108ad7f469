#!/usr/bin/env node
/**
 * chapterdl CLI
 * Download a MangaBuddy series chapter by chapter, with ComicInfo.xml metadata
 */

import { resolve } from "node:path"
import { Command } from "commander"
import { ConfigError, resolveConfig, type Config } from "../config.js"
import { downloadSeries, fetchSeries } from "../core/series.js"
import type { SeriesSummary } from "../core/types.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { ListingError } from "../scraper.js"
import { parseChapterSelection, type PositionRange } from "../selection.js"
import { createReporter, ui } from "../ui.js"

const VERSION = "0.1.0"

interface CliOptions {
	output?: string
	jobs?: string
	chapterJobs?: string
	retries?: string
	timeout?: string
	chapters?: string
	list: boolean
	resume: boolean
	metadata: boolean
	quiet: boolean
	verbose: boolean
}

function toNumber(value: string | undefined): number | undefined {
	return value === undefined ? undefined : Number(value)
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(err)
	}
	process.exitCode = code
}

function printChapterList(
	title: string,
	chapters: { name: string; url: string }[],
): void {
	ui.header(title)
	chapters.forEach((chapter, index) => {
		console.log(`${String(index + 1).padStart(4)}. ${chapter.name}  ${chapter.url}`)
	})
	console.log()
	ui.info(`${chapters.length} chapters`)
}

function printSummary(summary: SeriesSummary): boolean {
	const done: string[] = []
	const partial: string[] = []
	for (const { chapter, batch } of summary.chapters) {
		if (batch.status === "completed") {
			const failed = batch.outcomes.filter(ok => !ok).length
			if (failed === 0) {
				done.push(chapter.name)
			} else {
				partial.push(`${chapter.name} - ${failed}/${batch.outcomes.length} images failed`)
			}
		} else if (batch.status === "empty") {
			partial.push(`${chapter.name} - no images found`)
		} else {
			partial.push(`${chapter.name} - ${batch.reason}`)
		}
	}

	console.log()
	ui.summarySection("Downloaded", done, "green")
	ui.summarySection("Incomplete", partial, "red")
	ui.info(
		`${summary.imagesSucceeded} images saved, ${summary.imagesFailed} failed in ${(summary.durationMs / 1000).toFixed(1)}s`,
	)
	ui.info(`Output: ${summary.seriesDir}`)

	const allSuccess = partial.length === 0
	ui.finalStatus(allSuccess)
	return allSuccess
}

async function run(url: string, options: CliOptions): Promise<void> {
	const quiet = options.quiet
	const showsProgress = !quiet && process.stdout.isTTY

	// Progress bars own the terminal; send structured logs to a file meanwhile
	if (showsProgress || options.verbose) {
		const { logFilePath } = configureLogging({
			toFile: showsProgress,
			...(options.verbose ? { level: "debug" } : {}),
		})
		if (logFilePath && options.verbose) {
			ui.info(`Logging to ${logFilePath}`)
		}
	}

	let config: Config
	let selection: PositionRange[] | undefined
	try {
		config = resolveConfig({
			downloadPath: options.output,
			jobs: toNumber(options.jobs),
			chapterJobs: toNumber(options.chapterJobs),
			retryCount: toNumber(options.retries),
			timeoutSeconds: toNumber(options.timeout),
			metadata: options.metadata ? undefined : false,
		})
		selection = options.chapters
			? parseChapterSelection(options.chapters)
			: undefined
	} catch (err) {
		if (err instanceof ConfigError) {
			ui.error(err.message)
			await exitWithCode(2)
			return
		}
		throw err
	}

	const reporter = createReporter(quiet)
	const timeoutMs = Math.round(config.timeoutSeconds * 1000)
	const outputDir = resolve(config.downloadPath)

	try {
		if (options.list) {
			const details = await fetchSeries(url, { timeoutMs, quiet, reporter })
			printChapterList(details.metadata.Title ?? "Unknown Title", details.chapters)
			return
		}

		if (!quiet) {
			ui.banner(VERSION, outputDir, config.jobs, config.retryCount)
		}

		const summary = await downloadSeries(url, {
			outputDir,
			jobs: config.jobs,
			chapterJobs: config.chapterJobs,
			retries: config.retryCount,
			timeoutMs,
			retryDelayMs: config.retryDelayMs,
			maxRetryDelayMs: config.maxRetryDelayMs,
			resume: options.resume,
			metadata: config.metadata,
			selection,
			quiet,
			reporter,
		})

		const allSuccess = quiet
			? summary.imagesFailed === 0 && summary.chaptersSkipped === 0
			: printSummary(summary)
		await exitWithCode(allSuccess ? 0 : 1)
	} catch (err) {
		if (err instanceof ListingError) {
			ui.error(err.message)
			log.cli.debug({ err }, "series listing failed")
			await exitWithCode(1)
			return
		}
		throw err
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("chapterdl")
	.version(VERSION)
	.description("Download web comic chapters with retries and ComicInfo metadata")
	.argument("<url>", "Series URL (any page of the series works)")
	.option("-o, --output <dir>", "Download root directory")
	.option("-j, --jobs <number>", "Parallel image downloads")
	.option("--chapter-jobs <number>", "Chapters downloaded at the same time")
	.option("-r, --retries <number>", "Attempts per image")
	.option("--timeout <seconds>", "Per-request timeout in seconds")
	.option("-c, --chapters <ranges>", "Chapters to download, e.g. 1-5,8,12-")
	.option("--list", "List chapters and exit", false)
	.option("--resume", "Skip pages that are already on disk", false)
	.option("--no-metadata", "Skip ComicInfo.xml generation")
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Debug output", false)
	.action(run)

try {
	await program.parseAsync()
} catch (err) {
	log.cli.fatal({ err }, "unexpected error")
	ui.error(err instanceof Error ? err.message : String(err))
	await exitWithCode(1)
}
