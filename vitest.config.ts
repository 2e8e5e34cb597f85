import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		include: ['tests/**/*.test.ts'],
		setupFiles: ['./tests/setup.ts'],
		coverage: {
			provider: 'v8',
			reporter: ['text', 'lcov'],
			include: ['src/**/*.ts'],
			// Entry point only wires the process; needs a live bot token
			exclude: ['src/bot.ts'],
			thresholds: {
				branches: 70,
				functions: 80,
				lines: 80,
				statements: 80
			}
		},
		// One fork: winston file transports and in-memory databases stay per process
		pool: 'forks',
		poolOptions: {
			forks: {
				singleFork: true
			}
		}
	}
});
