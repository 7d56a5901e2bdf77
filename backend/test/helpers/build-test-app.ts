import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import type { UserStore } from '../../src/modules/users/user.store';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Seed is OFF by default.
 * - Uses the in-memory user store unless a test passes its own.
 */
export async function buildTestApp(
  overrides: Partial<AppConfig> = {},
  opts: { userStore?: UserStore } = {},
) {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,

    store: { kind: 'memory' },

    corsOrigins: ['http://localhost:5173'],

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'user-directory-backend',

    seed: {
      enabled: false, // IMPORTANT: OFF in tests by default
    },
  };

  const config: AppConfig = {
    ...baseConfig,
    ...overrides,
    seed: {
      ...baseConfig.seed,
      ...(overrides.seed ?? {}),
    },
  };

  return buildApp(config, opts);
}
