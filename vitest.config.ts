import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],

    // callback listener 測試會綁定實際的 loopback port
    testTimeout: 10000,
    hookTimeout: 10000,

    slowTestThreshold: 1000,
  },
});
