import { defineConfig } from 'vitest/config';

// Coverage is a root-level setting; per-project options live in vitest.workspace.ts
export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/core/src/**/*.ts', 'packages/cli/src/**/*.ts'],
      exclude: ['packages/core/src/index.ts'],
    },
  },
});
