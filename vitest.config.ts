import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      DB_PASSWORD: 'test-secret',
      LOG_LEVEL: 'silent',
    },
  },
});
