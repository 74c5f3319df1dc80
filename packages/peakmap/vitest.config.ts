import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'peakmap',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
    retry: 0,
  },
});
