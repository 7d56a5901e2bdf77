/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 * - store is a discriminated union: a postgres store always carries its databaseUrl,
 *   so DI never has to re-check for a missing connection string.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats "false" as true; parse the literal instead.
const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    USER_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().min(1).optional(),

    // Comma-separated list of origins allowed to call the API from a browser
    CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('user-directory-backend'),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: BooleanFlagSchema,
  })
  .superRefine((env, ctx) => {
    if (env.USER_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when USER_STORE=postgres',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type StoreConfig = { kind: 'postgres'; databaseUrl: string } | { kind: 'memory' };

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  store: StoreConfig;

  corsOrigins: string[];

  logLevel: string;
  serviceName: string;

  seed: {
    enabled: boolean;
  };
};

function parseOrigins(raw: string): string[] {
  return raw
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  const store: StoreConfig =
    parsed.USER_STORE === 'postgres' && parsed.DATABASE_URL
      ? { kind: 'postgres', databaseUrl: parsed.DATABASE_URL }
      : { kind: 'memory' };

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    store,

    corsOrigins: parseOrigins(parsed.CORS_ORIGIN),

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    seed: {
      enabled: parsed.SEED_ON_START,
    },
  };
}
