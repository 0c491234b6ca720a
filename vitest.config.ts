import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Set NODE_ENV for test detection (silences the pino logger)
    env: {
      NODE_ENV: 'test',
    },

    // Test file patterns
    include: ['packages/*/test/**/*.test.ts'],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/coverage/**',
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/**/src/**/*.d.ts'],
    },

    // Global APIs (describe, it, expect, vi)
    globals: true,

    // Timeout configuration
    testTimeout: 10000,

    // Retry configuration
    retry: 0,

    reporters: ['default'],
  },
});
