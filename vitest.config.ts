import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Single thread keeps the in-memory database and env vars per file predictable
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
    testTimeout: 15000,
    // Per-file setup: env vars, in-memory database, migrations
    setupFiles: ['tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    watch: false,
    sequence: {
      hooks: 'list',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',           // Entry point
        'src/scripts/**',         // CLI scripts
      ],
    },
  },
});
