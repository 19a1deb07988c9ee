import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Fake-timer suites must never hang a run
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
