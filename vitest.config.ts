import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["src/__tests__/**/*.test.ts"],
		testTimeout: 10000,
		hookTimeout: 10000,
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary"],
			include: ["src/**/*.ts"],
			exclude: ["src/__tests__/**", "src/index.ts", "src/cli.ts"],
		},
	},
});
