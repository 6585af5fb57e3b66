// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import describe/it/expect from "vitest"
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CORE must stay fully covered; SHELL spawns real processes and is covered by the fake host
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
