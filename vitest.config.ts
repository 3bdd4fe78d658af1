// CHANGE: Vitest configuration for CORE/SHELL test suites
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; tests never reach the network or spawn make/configure
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/index.ts"],
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
