import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['rain-alert/src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
