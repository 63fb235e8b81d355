import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns
    include: ['tests/**/*.test.ts'],

    exclude: ['node_modules/**'],

    environment: 'node',

    // Globals (describe, it, expect without imports)
    globals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: ['src/cli.ts', 'src/index.ts'],
    },

    typecheck: {
      enabled: false, // Use tsc for type checking
    },
  },
});
