import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOBBY_MONITOR_LOG_LEVEL: 'ERROR',
    },
  },
});
