/**
 * Centralized logging with pino
 *
 * Two outputs:
 * - pino carries structured records (debug detail, log files)
 * - ui.ts prints the short notices a user reads in the terminal
 *
 * Log levels:
 * - error: a series or chapter could not be processed
 * - warn: an image attempt failed or a chapter was skipped
 * - info: batch milestones
 * - debug: per-request detail (--verbose)
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname, join } from "node:path"
import pino from "pino"

const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** Send pino output to a file so it does not tear through the progress bars */
	toFile: boolean
	/** Explicit log file path; a per-run file under .log/ is used otherwise */
	logFilePath?: string
	/** Override the console level (e.g. "debug" for --verbose) */
	level?: string
}

let currentMode: "console" | "file" = "console"
let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function defaultLogFilePath(): string {
	const stamp = new Date().toISOString().replace(/[:.]/g, "-")
	return join(process.cwd(), ".log", `chapterdl-${stamp}-${process.pid}.log`)
}

function createConsoleLogger(consoleLevel: string = level) {
	return isDev
		? pino({
				level: consoleLevel,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level: consoleLevel,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string, fileLevel?: string) {
	ensureDirExists(path)
	// Sync writes: the CLI may set an exit code and return before an async
	// destination drains.
	const destination = pino.destination({ dest: path, sync: true })
	return pino(
		{
			level:
				fileLevel ??
				process.env["LOG_LEVEL_FILE"] ??
				(process.env["LOG_LEVEL"] || process.env["DEBUG"] ? level : "debug"),
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * Prefer createLogger() for a module-scoped child
 */
export let logger = createConsoleLogger()

/** Switch between console and file logging. Safe to call repeatedly. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	if (options.toFile) {
		const nextPath =
			options.logFilePath ?? currentLogFilePath ?? defaultLogFilePath()
		if (currentMode === "file" && currentLogFilePath === nextPath) {
			return { logFilePath: currentLogFilePath }
		}
		currentMode = "file"
		currentLogFilePath = nextPath
		logger = createFileLogger(nextPath, options.level)
		return { logFilePath: currentLogFilePath }
	}

	if (currentMode !== "console" || options.level) {
		currentMode = "console"
		currentLogFilePath = null
		logger = createConsoleLogger(options.level)
	}

	return { logFilePath: currentLogFilePath }
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("scrape")
 * log.debug({ chapterUrl }, "listing chapter images")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Getters so callers follow reconfiguration
export const log = {
	get scrape() {
		return createLogger("scrape")
	},
	get download() {
		return createLogger("download")
	},
	get batch() {
		return createLogger("batch")
	},
	get parallel() {
		return createLogger("parallel")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
