import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    hookTimeout: 10000,
    restoreMocks: true,
    env: {
      MODSOURCE_LOG_LEVEL: 'silent',
    },
  },
});
