/**
 * backend/vitest.config.ts
 *
 * Backend tests only: unit, dal (recording driver) and e2e (app.inject).
 * None of them need Postgres; the app is built with the in-memory user store.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
});
