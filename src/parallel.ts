/**
 * Parallel execution with concurrency control
 */

import pLimit from "p-limit"
import ora, { type Ora } from "ora"
import { log } from "./logger.js"

export interface ParallelResult<T, R> {
	/** Fulfilled tasks, in input order */
	success: { index: number; value: R }[]
	/** Rejected tasks, in input order */
	failed: { index: number; item: T; error: string }[]
}

export interface ParallelOptions {
	concurrency: number
	/** Names the run in debug logs */
	label: string
}

// Progress bars that want to own line output while they are drawn
let outputWriter: ((message: string) => void) | null = null

/**
 * Route plain log lines through a writer (e.g. MultiBar.log) while it is
 * on screen. Pass null to restore console output.
 */
export function setOutputWriter(
	writer: ((message: string) => void) | null,
): void {
	outputWriter = writer
}

/**
 * Print a line without tearing an active progress display.
 */
export function printLine(message: string): void {
	log.parallel.debug(message)

	if (outputWriter) {
		outputWriter(message)
	} else {
		console.log(message)
	}
}

/**
 * Run async tasks in parallel with limited concurrency.
 * A rejected task is recorded in `failed`; it never stops its siblings.
 */
export async function runParallel<T, R>(
	items: T[],
	fn: (item: T, index: number) => Promise<R>,
	options: ParallelOptions,
): Promise<ParallelResult<T, R>> {
	const { concurrency, label } = options
	const limit = pLimit(concurrency)

	const success: ParallelResult<T, R>["success"] = []
	const failed: ParallelResult<T, R>["failed"] = []

	const tasks = items.map((item, index) =>
		limit(async () => {
			try {
				const value = await fn(item, index)
				success.push({ index, value })
			} catch (err) {
				log.parallel.debug({ err, index }, `${label}: task failed`)
				failed.push({
					index,
					item,
					error: err instanceof Error ? err.message : String(err),
				})
			}
		}),
	)

	await Promise.all(tasks)

	success.sort((a, b) => a.index - b.index)
	failed.sort((a, b) => a.index - b.index)

	log.parallel.debug(
		{ label, succeeded: success.length, failed: failed.length },
		"parallel run complete",
	)
	return { success, failed }
}

/**
 * Create a simple progress spinner for a single operation
 */
export function createSpinner(text: string, quiet: boolean): Ora | null {
	if (quiet) return null
	return ora(text).start()
}
