import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: [
			'packages/*/src/**/*.test.ts',
			'sinks/*/src/**/*.test.ts',
			'transports/*/src/**/*.test.ts',
		],
		testTimeout: 10_000,
		restoreMocks: true,
	},
});
