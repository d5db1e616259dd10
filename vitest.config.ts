import { loadEnv } from "vite";
import { defineConfig } from "vitest/config";

export default defineConfig(({ mode }) => ({
	test: {
		include: ["src/tests/**/*.test.ts"],
		// LINESTREAM_* and DEBUG from .env files reach the tests.
		env: loadEnv(mode, process.cwd(), ""),
		testTimeout: 10_000,
	},
}));
