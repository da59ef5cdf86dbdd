import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'services/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/engine/src/**/*.ts', 'packages/game-spec/src/**/*.ts'],
      exclude: ['**/dist/**', '**/node_modules/**', '**/*.d.ts', '**/index.ts'],
    },
  },
});
