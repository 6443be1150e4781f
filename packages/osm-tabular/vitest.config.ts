import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'osm-tabular',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 5_000,
    environment: 'node',
    pool: 'forks',
  },
});
