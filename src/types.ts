/**
 * Shared type definitions for chapterdl
 */

// ─────────────────────────────────────────────────────────────────────────────
// Series & Chapters
// ─────────────────────────────────────────────────────────────────────────────

export interface ChapterRef {
	/** Display name, e.g. "Chapter 12" */
	name: string
	/** Absolute chapter page URL; also the Referer for its images */
	url: string
}

/**
 * ComicInfo fields. Keys match the XML element names.
 */
export interface ComicMetadata {
	Title?: string
	Series?: string
	Number?: string
	Volume?: string
	Summary?: string
	Writer?: string
	Penciller?: string
	Inker?: string
	Colorist?: string
	Letterer?: string
	CoverArtist?: string
	Editor?: string
	Publisher?: string
	Genre?: string
	Web?: string
	Manga?: string
}

export type ComicInfoField = keyof ComicMetadata

export interface SeriesDetails {
	metadata: ComicMetadata
	/** Sorted by chapter number */
	chapters: ChapterRef[]
}
