import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      FORCE_COLOR: '0'
    }
  }
});
