import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['catalog-pipeline/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
