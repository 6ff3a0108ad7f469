/**
 * ComicInfo.xml generation
 * Sidecar metadata read by comic library managers (Komga, Kavita, ...)
 */

import { rename, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { chapterNumberFromTitle } from "./scraper.js"
import type {
	ChapterRef,
	ComicInfoField,
	ComicMetadata,
} from "./types.js"

export const COMIC_INFO_FILENAME = "ComicInfo.xml"

/** Element order required by the ComicInfo schema */
export const COMIC_INFO_FIELDS: readonly ComicInfoField[] = [
	"Title",
	"Series",
	"Number",
	"Volume",
	"Summary",
	"Writer",
	"Penciller",
	"Inker",
	"Colorist",
	"Letterer",
	"CoverArtist",
	"Editor",
	"Publisher",
	"Genre",
	"Web",
	"Manga",
]

/**
 * Serialize metadata to a ComicInfo document. Empty fields are omitted.
 */
export function createComicInfoXml(metadata: ComicMetadata): string {
	const lines: string[] = []
	lines.push('<?xml version="1.0" encoding="utf-8"?>')
	lines.push("<ComicInfo>")

	for (const field of COMIC_INFO_FIELDS) {
		const value = metadata[field]
		if (value) {
			lines.push(`  <${field}>${escapeXml(value)}</${field}>`)
		}
	}

	lines.push("</ComicInfo>")
	return lines.join("\n") + "\n"
}

/**
 * Per-chapter record: series fields, with the chapter as Title/Number/Web.
 */
export function chapterMetadata(
	series: ComicMetadata,
	chapter: ChapterRef,
): ComicMetadata {
	const metadata: ComicMetadata = {
		...series,
		Title: chapter.name,
		Web: chapter.url,
	}
	const seriesTitle = series.Series ?? series.Title
	if (seriesTitle) {
		metadata.Series = seriesTitle
	}

	const number = chapterNumberFromTitle(chapter.name)
	if (Number.isFinite(number)) {
		metadata.Number = String(number)
	}
	return metadata
}

/**
 * Write ComicInfo.xml into `dir` (write-then-rename)
 *
 * @returns the file path
 */
export async function writeComicInfo(
	dir: string,
	metadata: ComicMetadata,
): Promise<string> {
	const path = join(dir, COMIC_INFO_FILENAME)
	const partPath = `${path}.part`
	try {
		await writeFile(partPath, createComicInfoXml(metadata), "utf8")
		await rename(partPath, path)
	} catch (err) {
		await rm(partPath, { force: true })
		throw err
	}
	return path
}

function escapeXml(str: string): string {
	return str
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;")
}
