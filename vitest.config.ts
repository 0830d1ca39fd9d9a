import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    globals: true,
    include: ['src/**/*.test.ts', 'tests/**/*.spec.ts'],
    restoreMocks: true,
  },
});
