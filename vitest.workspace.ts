/**
 * Vitest Workspace Configuration
 *
 * Workspace Projects:
 * - core: @loxkit/core package tests
 * - cli: @loxkit/cli package tests
 *
 * Run specific projects:
 *   npx vitest run --project=core
 *   npx vitest run --project=cli
 *
 * Run all tests:
 *   npx vitest run
 */
import { fileURLToPath } from 'node:url';
import { defineWorkspace } from 'vitest/config';

// The CLI imports the core package by name; point it at the sources
const coreEntry = fileURLToPath(
  new URL('./packages/core/src/index.ts', import.meta.url)
);

export default defineWorkspace([
  // Core package (@loxkit/core)
  {
    test: {
      name: 'core',
      globals: true,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  // CLI package (@loxkit/cli)
  {
    resolve: {
      alias: { '@loxkit/core': coreEntry },
    },
    test: {
      name: 'cli',
      globals: true,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
