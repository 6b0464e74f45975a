import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		environment: "node",
		include: ["test/**/*.test.ts"],
		env: {
			LOG_LEVEL: "silent",
			NODE_ENV: "test",
		},
	},
});
