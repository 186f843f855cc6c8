import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // integration suites bind fixed ports and share temp dirs per file
    fileParallelism: false,
    testTimeout: 15000,
  },
});
