import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// loadConfig tests chdir into a temp dir, which worker threads reject
		pool: "forks",
	},
})
