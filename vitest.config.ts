import path from "node:path";
import { defineConfig } from "vitest/config";

const packages = path.resolve(__dirname, "packages");

export default defineConfig({
	resolve: {
		alias: {
			"@tracklink/core": path.join(packages, "core/src/index.ts"),
			"@tracklink/connector-jira": path.join(packages, "connector-jira/src/index.ts"),
			"@tracklink/engine": path.join(packages, "engine/src/index.ts"),
		},
	},
	test: {
		globals: true,
		include: ["packages/*/src/**/__tests__/**/*.test.ts", "tests/integration/**/*.test.ts"],
		testTimeout: 30_000,
	},
});
