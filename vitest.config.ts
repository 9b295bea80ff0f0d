// PURITY: SHELL (configuration only)
// INVARIANT: tests import describe/it/expect from "vitest" explicitly (no globals)

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CORE is pure and covered completely; SHELL is covered through fakes.
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
