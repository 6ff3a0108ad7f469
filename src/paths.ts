/**
 * On-disk naming for series, chapters and pages
 */

import { extname, join } from "node:path"

const DEFAULT_IMAGE_EXTENSION = ".jpg"
const MIN_PAGE_DIGITS = 3

/**
 * Replace characters that are invalid in file names on common filesystems
 */
export function sanitizeFilename(name: string): string {
	return name.replace(/[\\/*?:"<>|]/g, "_")
}

function locatorPath(locator: string): string {
	try {
		return new URL(locator).pathname
	} catch {
		// Relative or malformed: strip query and fragment by hand
		return locator.split(/[?#]/, 1)[0] ?? ""
	}
}

/**
 * Infer a file extension from an image URL, ignoring query and fragment.
 * Falls back to .jpg when the path has no usable extension.
 */
export function inferExtension(locator: string): string {
	const path = locatorPath(locator)
	const lastSegment = path.slice(path.lastIndexOf("/") + 1)
	const ext = extname(lastSegment)
	return /^\.[A-Za-z0-9]+$/.test(ext) ? ext : DEFAULT_IMAGE_EXTENSION
}

/**
 * Destination file name for the page at `index` (0-based) of a batch of
 * `total` pages. Zero-padded so lexical order equals reading order.
 *
 * @example
 * pageFileName(0, 12, "https://cdn.example/p/01.webp?t=1") // "page_001.webp"
 */
export function pageFileName(
	index: number,
	total: number,
	locator: string,
): string {
	const width = Math.max(MIN_PAGE_DIGITS, String(total).length)
	const number = String(index + 1).padStart(width, "0")
	return `page_${number}${inferExtension(locator)}`
}

export function seriesDirectory(root: string, seriesTitle: string): string {
	return join(root, sanitizeFilename(seriesTitle))
}

export function chapterDirectory(
	root: string,
	seriesTitle: string,
	chapterName: string,
): string {
	return join(seriesDirectory(root, seriesTitle), sanitizeFilename(chapterName))
}
