import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		env: {
			MPRIS_CONTROL_LOG_CONSOLE: "false",
			MPRIS_CONTROL_LOG_FILE: "false",
		},
	},
});
