import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/**', 'dist/**', '**/*.config.{js,ts}', '**/*.test.{js,ts}'],
    },
    include: ['src/**/*.{test,spec}.ts'],
    setupFiles: ['./src/tests/setup.ts'],
  },
});
