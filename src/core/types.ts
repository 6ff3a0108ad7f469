/**
 * Core types for the chapter download engine
 *
 * The batch orchestrator talks to the outside world only through these:
 * a progress sink, a reporter, and the fetch overrides tests use.
 */

import type { Sleep, Transport } from "../download.js"
import type { Gate } from "../gate.js"
import type { ProgressSink } from "../progress.js"
import type { Reporter } from "../ui.js"
import type { ChapterRef, ComicMetadata } from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Batch
// ─────────────────────────────────────────────────────────────────────────────

export interface BatchOptions {
	/** Directory the pages are written to; created before any fetch */
	destDir: string
	/** Origin page of the batch, sent as Referer with every image request */
	referer: string
	/** Shown on the progress bar */
	label: string
	/** Shared admission gate. When absent a batch-local one of `concurrency` is used */
	gate?: Gate | undefined
	/** Capacity of the batch-local gate */
	concurrency: number
	retries: number
	timeoutMs: number
	retryDelayMs?: number | undefined
	maxRetryDelayMs?: number | undefined
	/** Skip positions whose file already exists. Off by default: re-runs overwrite */
	resume?: boolean | undefined
	progress?: ProgressSink | undefined
	reporter?: Reporter | undefined
	transport?: Transport | undefined
	sleep?: Sleep | undefined
}

/** Every item reached a terminal state; outcomes are in position order */
export interface CompletedBatch {
	status: "completed"
	destDir: string
	outcomes: boolean[]
}

/** The lister returned no locators; nothing was fetched */
export interface EmptyBatch {
	status: "empty"
	destDir: string
	outcomes: []
}

/** The lister failed; nothing was fetched */
export interface SkippedBatch {
	status: "skipped"
	destDir: string
	reason: string
}

export type BatchResult = CompletedBatch | EmptyBatch | SkippedBatch

/** Produces the ordered image locators of one chapter */
export type ImageLister = (chapterUrl: string) => Promise<string[]>

// ─────────────────────────────────────────────────────────────────────────────
// Series
// ─────────────────────────────────────────────────────────────────────────────

export interface ChapterResult {
	chapter: ChapterRef
	batch: BatchResult
	/** Path of the ComicInfo.xml written, if any */
	metadataPath: string | null
}

export interface SeriesSummary {
	metadata: ComicMetadata
	seriesDir: string
	chapters: ChapterResult[]
	/** Images saved across all chapters */
	imagesSucceeded: number
	imagesFailed: number
	/** Chapters whose listing failed or came back empty */
	chaptersSkipped: number
	durationMs: number
}
