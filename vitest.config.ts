import { defineConfig } from 'vitest/config';

const TEST_TIMEOUT_MS = 20000;

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['backend/src/**/__tests__/**/*.test.ts', 'shared/**/__tests__/**/*.test.ts'],
    testTimeout: TEST_TIMEOUT_MS,
  },
});
