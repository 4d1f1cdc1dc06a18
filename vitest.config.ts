import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      // Cheapest cost bcrypt allows; keeps credential checks fast in tests.
      BCRYPT_ROUNDS: '4',
    },
  },
});
