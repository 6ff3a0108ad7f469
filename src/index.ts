// Library entry point
// For CLI usage, run: npx chapterdl <series-url>

export * from "./types.js"
export * from "./config.js"
export * from "./gate.js"
export * from "./paths.js"
export * from "./progress.js"
export * from "./metadata.js"
export * from "./selection.js"
export * from "./scraper.js"
export {
	BASE_HEADERS,
	HTTP_AGENT,
	HttpStatusError,
	buildHeaders,
} from "./http.js"
export {
	EmptyPayloadError,
	backoffDelay,
	fetchWithRetry,
	httpTransport,
	type FetchOptions,
	type Sleep,
	type Transport,
} from "./download.js"
export { ui, createReporter, silentReporter, type Reporter } from "./ui.js"
export * from "./core/types.js"
export * from "./core/batch.js"
export * from "./core/series.js"
