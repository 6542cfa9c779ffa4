import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    testTimeout: 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    // Quiets default loggers and console output
    setupFiles: ['./test/setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts', 'src/chat-cli.ts'],
    },

    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
      },
    },

    clearMocks: true,
    restoreMocks: true,
  },
});
