import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
	resolve: {
		alias: {
			botdeck: fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
		},
	},
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
		testTimeout: 10_000,
	},
});
