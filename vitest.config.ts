// CHANGE: Vitest configuration for the primary switcher test suite
// WHY: Native ESM + NodeNext imports; tests live under test/ mirroring src/
// PURITY: SHELL (configuration only)
// INVARIANT: No test reaches a real X server, compositor or notification daemon
// COMPLEXITY: O(n) test execution where n = |test_files|

import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			// CHANGE: 100% for CORE, lower floor for SHELL
			// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
