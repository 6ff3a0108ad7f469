/**
 * Progress sinks for chapter batches
 * One cli-progress bar per batch, all drawn in a shared MultiBar
 */

import cliProgress from "cli-progress"
import chalk from "chalk"
import { setOutputWriter } from "./parallel.js"

/** Opaque handle returned by onTaskCreated */
export type ProgressHandle = number

/**
 * Receives advancement ticks from the batch orchestrator. The orchestrator
 * calls these unconditionally; a sink that ignores them changes nothing
 * about how images are fetched.
 */
export interface ProgressSink {
	onTaskCreated(total: number, label: string): ProgressHandle
	onAdvance(handle: ProgressHandle, delta: number): void
	onTaskRemoved(handle: ProgressHandle): void
}

/** A sink that also owns terminal resources and must be stopped */
export interface StoppableProgressSink extends ProgressSink {
	stop(): void
}

export const NOOP_PROGRESS: StoppableProgressSink = {
	onTaskCreated: () => 0,
	onAdvance: () => {},
	onTaskRemoved: () => {},
	stop: () => {},
}

/** Terminal stream the bars draw to */
export type ProgressStream = NodeJS.WritableStream & { isTTY?: boolean }

export interface ProgressSinkOptions {
	quiet?: boolean
	/** Defaults to stdout */
	stream?: ProgressStream
	/** Width reserved for the batch label column */
	labelWidth?: number
}

/**
 * Create the terminal progress sink. Quiet mode, or a stream that is not a
 * terminal, gets the no-op sink.
 */
export function createProgressSink(
	options: ProgressSinkOptions = {},
): StoppableProgressSink {
	const { quiet = false, labelWidth = 32, stream = process.stdout } = options
	if (quiet || !stream.isTTY) {
		return NOOP_PROGRESS
	}

	const multibar = new cliProgress.MultiBar(
		{
			stream,
			clearOnComplete: false,
			hideCursor: true,
			// 10 Hz is plenty for page counts and avoids flicker
			fps: 10,
			stopOnComplete: false,
			format: (options, params, payload: { label?: string }) => {
				const bar = (options.barCompleteString ?? "")
					.substring(0, Math.round(params.progress * 30))
					.padEnd(30, options.barIncompleteString ?? " ")
				const label = truncate(payload.label ?? "", labelWidth)
				const percentage = Math.round(params.progress * 100)
				return `${chalk.cyan(label)} ${bar} ${chalk.yellow(`${percentage}%`.padStart(4))} ${chalk.gray(`${params.value}/${params.total}`)}`
			},
		},
		cliProgress.Presets.shades_grey,
	)

	setOutputWriter(message => multibar.log(`${message}\n`))

	const bars = new Map<ProgressHandle, cliProgress.SingleBar>()
	let nextHandle = 1

	return {
		onTaskCreated(total: number, label: string): ProgressHandle {
			const handle = nextHandle++
			bars.set(handle, multibar.create(total, 0, { label }))
			return handle
		},

		onAdvance(handle: ProgressHandle, delta: number): void {
			bars.get(handle)?.increment(delta)
		},

		onTaskRemoved(handle: ProgressHandle): void {
			const bar = bars.get(handle)
			if (!bar) return
			bar.stop()
			multibar.remove(bar)
			bars.delete(handle)
		},

		stop(): void {
			for (const bar of bars.values()) {
				multibar.remove(bar)
			}
			bars.clear()
			multibar.stop()
			setOutputWriter(null)
		},
	}
}

function truncate(text: string, width: number): string {
	return text.length > width
		? text.slice(0, width - 3) + "..."
		: text.padEnd(width)
}
