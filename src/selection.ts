/**
 * Chapter selection from a range list such as "1-5,8,12-"
 *
 * Positions are 1-based indexes into the sorted chapter list.
 */

import { ConfigError } from "./config.js"

export interface PositionRange {
	start: number
	/** Inclusive; Infinity for an open-ended range */
	end: number
}

function parsePosition(text: string, input: string): number {
	if (!/^\d+$/.test(text)) {
		throw new ConfigError(`Invalid chapter selection "${input}": "${text}" is not a number`)
	}
	const value = Number(text)
	if (value < 1) {
		throw new ConfigError(`Invalid chapter selection "${input}": positions start at 1`)
	}
	return value
}

/**
 * @throws ConfigError on malformed input
 */
export function parseChapterSelection(input: string): PositionRange[] {
	const parts = input
		.split(",")
		.map(part => part.trim())
		.filter(part => part.length > 0)

	if (parts.length === 0) {
		throw new ConfigError(`Invalid chapter selection "${input}": nothing selected`)
	}

	return parts.map(part => {
		const dash = part.indexOf("-")
		if (dash === -1) {
			const position = parsePosition(part, input)
			return { start: position, end: position }
		}

		const left = part.slice(0, dash).trim()
		const right = part.slice(dash + 1).trim()
		const start = left ? parsePosition(left, input) : 1
		const end = right ? parsePosition(right, input) : Infinity
		if (end < start) {
			throw new ConfigError(`Invalid chapter selection "${input}": ${part} is reversed`)
		}
		return { start, end }
	})
}

/**
 * Keep the items whose 1-based position falls in any range, in their
 * original order and without duplicates.
 */
export function selectChapters<T>(items: T[], ranges: PositionRange[]): T[] {
	return items.filter((_, index) => {
		const position = index + 1
		return ranges.some(range => position >= range.start && position <= range.end)
	})
}
