import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["src/**/*.test.ts"],
		// commands under test call process.chdir, which worker threads reject
		pool: "forks",
	},
});
