import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // argon2id hashing with production parameters is slow on shared runners
    testTimeout: 20000,
  },
});
