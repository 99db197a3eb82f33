import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup/env.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['packages/main/src/**/*.ts', 'packages/shared/src/**/*.ts'],
      exclude: ['tests/**', 'dist/**', 'packages/main/src/main.ts', 'packages/main/src/workers/ingestWorker.ts'],
      thresholds: {
        statements: 10,
        lines: 10,
        functions: 10,
        branches: 5
      }
    }
  }
});
