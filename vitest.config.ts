import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      ANTHROPIC_API_KEY: 'test-key',
      STORE_DRIVER: 'sqlite',
      SQLITE_PATH: ':memory:',
      LOG_LEVEL: 'error',
      GENERATION_TIMEOUT_MS: '2000',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts'],
    },
  },
});
