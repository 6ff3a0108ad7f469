/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"

const ConfigSchema = z.object({
	/** Simultaneous image fetches across the whole run */
	jobs: z.number().int().min(1).max(32).default(5),
	/** Chapters processed at the same time */
	chapterJobs: z.number().int().min(1).max(8).default(1),
	/** Attempts per image, first try included */
	retryCount: z.number().int().min(1).max(10).default(3),
	/** Per-attempt transport timeout; whole milliseconds must fit a timer */
	timeoutSeconds: z.number().positive().max(4_294_967).default(30),
	/** Backoff unit: attempt a waits 2^a units before the next one */
	retryDelayMs: z.number().int().min(0).default(1000),
	/** Optional ceiling on a single backoff sleep; unbounded when absent */
	maxRetryDelayMs: z.number().int().min(0).optional(),
	downloadPath: z.string().min(1).default("downloads"),
	metadata: z.boolean().default(true),
})

export type Config = z.infer<typeof ConfigSchema>
type ConfigInput = z.input<typeof ConfigSchema>

/** Explicit settings (CLI flags); undefined entries fall through to the file */
export type ConfigOverrides = {
	[K in keyof ConfigInput]?: ConfigInput[K] | undefined
}

const DEFAULT_CONFIG: Config = ConfigSchema.parse({})

/**
 * Invalid configuration. Raised before any network activity.
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		readonly issues: string[] = [],
	) {
		super(message)
		this.name = "ConfigError"
	}
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => {
		const key = issue.path.join(".") || "(root)"
		return `${key}: ${issue.message}`
	})
}

function parseConfig(input: unknown, source: string): Config {
	const result = ConfigSchema.safeParse(input)
	if (!result.success) {
		const issues = formatIssues(result.error)
		throw new ConfigError(
			`Invalid configuration (${source}): ${issues.join("; ")}`,
			issues,
		)
	}
	return result.data
}

export function configSearchPaths(
	cwd: string = process.cwd(),
	home: string = homedir(),
): string[] {
	return [
		join(cwd, ".chapterdlrc"),
		join(cwd, ".chapterdlrc.json"),
		join(home, ".chapterdlrc"),
		join(home, ".chapterdlrc.json"),
	]
}

/**
 * Read the first rc file found (JSON format), without defaults applied.
 * Returns an empty object when there is none.
 */
export function readConfigFile(paths: string[] = configSearchPaths()): {
	path: string | null
	values: Record<string, unknown>
} {
	for (const path of paths) {
		if (!existsSync(path)) continue

		let parsed: unknown
		try {
			parsed = JSON.parse(readFileSync(path, "utf-8"))
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err)
			throw new ConfigError(`Could not read ${path}: ${reason}`)
		}
		if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
			throw new ConfigError(`Could not read ${path}: expected a JSON object`)
		}
		return { path, values: { ...parsed } }
	}
	return { path: null, values: {} }
}

/**
 * Merge defaults, the rc file and explicit overrides (highest precedence),
 * then validate the result.
 *
 * @throws ConfigError when any value is out of range
 */
export function resolveConfig(
	overrides: ConfigOverrides = {},
	paths?: string[],
): Config {
	const file = readConfigFile(paths)
	return parseConfig(
		{ ...file.values, ...definedOnly(overrides) },
		file.path ?? "command line",
	)
}

/**
 * Load configuration from the rc file alone
 */
export function loadConfig(paths?: string[]): Config {
	return resolveConfig({}, paths)
}

function definedOnly(values: object): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(values).filter(([, value]) => value !== undefined),
	)
}

export { DEFAULT_CONFIG }
