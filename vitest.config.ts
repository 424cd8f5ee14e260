import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Only include test files in tests/ directory
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],
    env: {
      NODE_ENV: 'test',
      COMPANION_LOG_LEVEL: 'silent',
    },
    // Cache persistence tests write to temp dirs; keep files sequential
    fileParallelism: false,
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
