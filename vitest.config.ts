import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_TO_FILE: 'false',
      STORE_NAME: 'MC HEROS',
    },
  },
});
