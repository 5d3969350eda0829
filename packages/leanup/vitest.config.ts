import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
	},
})
