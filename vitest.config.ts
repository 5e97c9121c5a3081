import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setupTests.ts'],
    testTimeout: 30000, // runner tests spend real wall-clock time
  },
});
