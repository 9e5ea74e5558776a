import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Transfers and radargram fixtures write into per-test temp dirs
    testTimeout: 10000,
  },
});
