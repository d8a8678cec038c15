import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['*/src/**/__tests__/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    testTimeout: 30000, // integration tests start real HTTP servers
    hookTimeout: 30000,
    globals: false,
    environment: 'node',
  },
});
