import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/functions/src/**/*.test.ts'],
    setupFiles: ['./packages/functions/src/__tests__/vitest.setup.ts'],
    globals: true,
  },
});
