import { defineConfig } from "vitest/config";

export default defineConfig({
	esbuild: {
		jsx: "automatic",
		jsxImportSource: "hono/jsx",
	},
	test: {
		environment: "node",
		testTimeout: 10000,
		include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
		exclude: ["**/node_modules/**", "**/dist/**"],
	},
});
