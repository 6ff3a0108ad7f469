/**
 * Terminal output helpers with consistent styling
 *
 * Everything goes through printLine() so notices printed while the
 * progress bars are on screen do not tear them.
 */

import chalk from "chalk"
import { printLine } from "./parallel.js"

/**
 * The slice of terminal output the download core needs. Injected so tests
 * and library callers can capture or silence it.
 */
export interface Reporter {
	info(text: string): void
	success(text: string): void
	warn(text: string): void
	error(text: string): void
}

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		printLine(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	success(text: string): void {
		printLine(chalk.green("✓") + " " + text)
	},

	error(text: string): void {
		printLine(chalk.red("✗") + " " + chalk.red(text))
	},

	warn(text: string): void {
		printLine(chalk.yellow("⚠") + " " + chalk.yellow(text))
	},

	info(text: string): void {
		printLine(chalk.blue("ℹ") + " " + text)
	},

	banner(version: string, target: string, jobs: number, retries: number): void {
		console.log(chalk.bold("chapterdl") + ` v${version}`)
		console.log(`Output: ${chalk.cyan(target)}`)
		console.log(`Jobs: ${chalk.cyan(String(jobs))} parallel image downloads`)
		console.log(`Retries: ${chalk.cyan(String(retries))} attempts per image`)
		console.log()
	},

	/** Format a list of results for summary */
	summarySection(title: string, items: string[], color: "green" | "red"): void {
		if (items.length === 0) return
		const colorFn = color === "green" ? chalk.green : chalk.red
		const symbol = color === "green" ? "✓" : "✗"
		console.log(colorFn(`${title} (${items.length}):`))
		for (const item of items) {
			console.log(`  ${symbol} ${item}`)
		}
	},

	finalStatus(allSuccess: boolean): void {
		console.log()
		if (allSuccess) {
			console.log(chalk.green.bold("✓ All chapters downloaded successfully!"))
		} else {
			console.log(
				chalk.yellow.bold("⚠ Some downloads failed. See above for details."),
			)
		}
		console.log()
	},
}

/**
 * Reporter for the CLI. Quiet mode keeps only errors.
 */
export function createReporter(quiet: boolean): Reporter {
	if (!quiet) return ui
	return {
		info: () => {},
		success: () => {},
		warn: () => {},
		error: text => ui.error(text),
	}
}

export const silentReporter: Reporter = {
	info: () => {},
	success: () => {},
	warn: () => {},
	error: () => {},
}
