import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['cli/src/**/__tests__/**/*.test.ts'],
  },
});
