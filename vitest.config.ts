import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// requests are mocked through undici's global dispatcher, so keep
		// each test file in its own process
		pool: 'forks',
		include: ['test/test.*.ts'],
		testTimeout: 20_000,
		coverage: {
			provider: 'v8',
			include: ['src/**/*.ts'],
		},
	},
});
