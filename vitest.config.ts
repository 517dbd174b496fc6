import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DB_PATH: ':memory:',
      LOG_LEVEL: 'ERROR',
      TRANSMISSION_URL: 'http://transmission.test/transmission/rpc',
    },
  },
});
