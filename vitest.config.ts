import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@tapline/core": `${packages}/core/src/index.ts`,
			"@tapline/connector-quickbase": `${packages}/connector-quickbase/src/index.ts`,
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
