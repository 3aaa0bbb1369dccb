import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['lanwatch-daemon/src/**/*.test.ts'],
    environment: 'node',
  },
});
