import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@beacon/core": fromRoot("./packages/core/src/index.ts"),
			"@beacon/telemetry": fromRoot("./packages/telemetry/src/index.ts"),
		},
	},
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "packages/cli/src/index.ts"],
		},
	},
});
