import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    pool: 'forks',
    // Watcher tests create real temp directories and chokidar instances
    fileParallelism: false,
    testTimeout: 20000,
    sequence: {
      concurrent: false,
    },
  },
});
