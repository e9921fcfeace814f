import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		restoreMocks: true,
		unstubGlobals: true,
		env: {
			LOG_LEVEL: "error",
		},
	},
});
