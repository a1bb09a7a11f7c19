import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 20000,
    hookTimeout: 10000,
    watch: false,
    clearMocks: true,
    restoreMocks: true,
  },
});
