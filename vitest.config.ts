import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: [
			"packages/*/src/**/*.test.ts",
			"packages/*/tests/**/*.test.ts",
			"apps/*/src/**/*.test.ts",
		],
		setupFiles: ["./tests/setup.ts"],
		environment: "node",
		pool: "forks",
		testTimeout: 10_000,
	},
});
