import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Keep router debug and config warnings out of the test output
    onConsoleLog: () => false,
  },
});
