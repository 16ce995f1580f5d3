import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/api/test/**/*.test.ts'],
    environment: 'node',
    // argon2 at its default cost takes a few hundred ms per hash
    testTimeout: 20000,
  },
});
