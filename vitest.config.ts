import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/**", "src/logger.ts", "src/progress.ts"],
			thresholds: {
				// The download core - concurrency and retry invariants
				"src/gate.ts": { statements: 95, branches: 90 },
				"src/download.ts": { statements: 90, branches: 80 },
				"src/core/batch.ts": { statements: 90, branches: 80 },
				// Parsing
				"src/scraper.ts": { statements: 85, branches: 70 },
				"src/selection.ts": { statements: 95, branches: 90 },
			},
		},
	},
})
