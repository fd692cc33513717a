import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    passWithNoTests: true,
    reporters: ['default'],
    testTimeout: 30000,
    silent: true,
  },
});
