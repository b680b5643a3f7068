import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		globals: false,
		include: ["src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			exclude: ["src/__tests__/**"],
			reporter: ["text", "json", "html", "lcov"],
		},
	},
});
