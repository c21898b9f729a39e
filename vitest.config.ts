import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    environment: 'node',

    testTimeout: 10000,

    // Runs before each test file
    setupFiles: ['./tests/helpers/setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli/**'],
    },

    globals: true,
  },
});
