import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Code images go through sharp, which is slow on a cold start.
    testTimeout: 30000
  }
});
