import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sdks/typescript/src/**/*.test.ts'],
    globals: false,
  },
});
