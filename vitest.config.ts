import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    globals: true,
    environment: 'node',
    testTimeout: 30000,
    hookTimeout: 30000,
    env: { NO_COLOR: '1' },

    // Suppress console output from tests (command output is asserted through spies)
    onConsoleLog: () => false,
  },
});
