import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true, // Use describe, it, expect without imports
    environment: 'node',
    testTimeout: 30000, // Integration tests spawn real processes
    // Helpers and fixtures under __tests__ are not test files
    include: ['**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
