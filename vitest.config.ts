import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		// happy-dom supplies the document for the DOM suites
		environment: "happy-dom",
		include: ["packages/*/src/**/*.{test,spec}.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
	},
});
