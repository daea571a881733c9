import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for the Vacation Desk service
 *
 * Runs unit and integration tests in a Node.js environment. Outbound HTTP
 * (GitHub, Gemini) is intercepted in-process by msw, and the document store
 * is replaced by an in-memory double, so no test reaches the network.
 */
export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Global test setup
    globals: true,
    setupFiles: ['./tests/setup.ts'],

    // Test file patterns
    include: ['tests/**/*.test.ts', 'tests/**/*.spec.ts'],

    // Files to exclude
    exclude: ['node_modules/**', 'dist/**', 'coverage/**'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      exclude: ['node_modules/**', 'dist/**', 'tests/**', '**/*.config.ts', 'src/index.ts', 'src/server.ts'],
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    // Mock reset behavior
    clearMocks: true,
    restoreMocks: true,

    sequence: {
      shuffle: false,
    },
  },
});
