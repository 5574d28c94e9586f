import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'jsdom',
    include: ['client/src/**/*.test.ts', 'client/src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: 'coverage',
      include: ['client/src/**/*.ts'],
      exclude: ['client/src/main.ts', 'client/src/**/*.d.ts', 'client/src/**/*.test.ts', 'client/src/**/*.spec.ts'],
    },
    setupFiles: ['client/src/__tests__/setup.ts'],
    pool: 'forks',
  },
});
