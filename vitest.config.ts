import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['server/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
