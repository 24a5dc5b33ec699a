import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    // Environment
    environment: 'node',
    globals: true,

    // Test files
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Timeout
    testTimeout: 10000, // 10 seconds for unit tests

    // Setup
    setupFiles: ['./test/setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/test/**', '**/*.test.ts', '**/index.ts'],
    },
  },

  // Path aliases
  resolve: {
    alias: {
      '@scoutline/shared-types': path.resolve(__dirname, '../../packages/shared-types/src'),
    },
  },
});
