import { describe, it, expect } from "vitest"
import { PassThrough } from "node:stream"
import { NOOP_PROGRESS, createProgressSink } from "../../src/progress.js"

function terminal(isTTY: boolean): PassThrough & { isTTY: boolean } {
	return Object.assign(new PassThrough(), { isTTY })
}

describe("createProgressSink", () => {
	it("draws nothing when the bar stream is not a terminal", () => {
		expect(createProgressSink({ stream: terminal(false) })).toBe(NOOP_PROGRESS)
	})

	it("draws nothing in quiet mode, even on a terminal", () => {
		expect(createProgressSink({ quiet: true, stream: terminal(true) })).toBe(
			NOOP_PROGRESS,
		)
	})

	it("creates bars when the stream it draws to is a terminal", () => {
		const sink = createProgressSink({ stream: terminal(true) })
		try {
			expect(sink).not.toBe(NOOP_PROGRESS)
			expect(sink.onTaskCreated(3, "Chapter 1")).toBe(1)
			expect(sink.onTaskCreated(2, "Chapter 2")).toBe(2)
		} finally {
			sink.stop()
		}
	})
})
