/**
 * Vitest Configuration for pep-resolve
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Setup files run before tests
    setupFiles: ['./tests/setup.ts'],

    // Enable globals for describe, it, expect
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },

    // Environment
    environment: 'node',

    // Type checking
    typecheck: {
      enabled: false, // use tsc --noEmit separately
    },
  },
});
