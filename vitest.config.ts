import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Do not pick up the repo-root `.env` during tests.
  envDir: 'src',
  test: {
    globals: false,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
