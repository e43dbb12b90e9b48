/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Environment configuration
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],

    // Explicit imports from vitest in every test file
    globals: false,

    // Test execution
    pool: 'threads',
    isolate: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'coverage/**',
        'dist/**',
        '**/*.d.ts',
        'test/**',
        '**/*.test.ts',
        '**/vitest.config.*',
        'src/constants.ts',
      ],
    },

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    watch: false,

    // Quiets the pino loggers before any module under test creates one
    setupFiles: ['./test/setup.ts'],

    allowOnly: !process.env.CI,
    passWithNoTests: false,

    typecheck: {
      enabled: false, // tsc --noEmit runs separately
    },
  },
});
