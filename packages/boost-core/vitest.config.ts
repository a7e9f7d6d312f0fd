/**
 * Workspace-level Vitest config for @boost-pipeline/boost-core
 *
 * WHY: `npm test -w` runs from this directory, where the root include
 *      patterns do not resolve.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
