import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Tests touch process.env and temp dirs; keep files sequential
    fileParallelism: false,
    testTimeout: 10000,
  },
});
