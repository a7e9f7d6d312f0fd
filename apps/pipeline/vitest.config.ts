/**
 * Workspace-level Vitest config for @boost-pipeline/pipeline
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: false,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
    },
  },
});
