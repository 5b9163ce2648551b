// CHANGE: Vitest configuration for the cxxstyle test suite
// WHY: Native ESM runner that loads the TypeScript sources directly
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		// Tests import { describe, it, expect } from "vitest" explicitly
		globals: false,
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

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
