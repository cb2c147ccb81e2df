/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - Secrets (token signing keys, seed password) enter the process here and
 *   are handed to constructors by di.ts. Nothing else reads process.env
 *   (the logger bootstrap aside).
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') fail at startup instead of silently
 *   falling through to the wrong branch in di.ts.
 */

import 'dotenv/config';
import { z } from 'zod';

import type { SigningKey } from '../shared/security/token-signer';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats the string "false" as true.
const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const SigningSecretSchema = z
  .string()
  .min(32, 'Token signing secrets must be at least 32 characters');

const KeyIdSchema = z.string().regex(/^[A-Za-z0-9._-]+$/, 'Key ids may only use [A-Za-z0-9._-]');

/**
 * "k0:secret,k-1:other-secret" → [{ id: 'k0', secret: 'secret' }, ...]
 * Secrets may contain ':' (only the first one splits).
 */
const PreviousKeysSchema = z
  .string()
  .default('')
  .transform((raw, ctx): SigningKey[] => {
    const keys: SigningKey[] = [];

    for (const entry of raw.split(',')) {
      const trimmed = entry.trim();
      if (!trimmed) continue;

      const sep = trimmed.indexOf(':');
      const id = KeyIdSchema.safeParse(sep > 0 ? trimmed.slice(0, sep) : '');
      const secret = SigningSecretSchema.safeParse(sep > 0 ? trimmed.slice(sep + 1) : '');

      if (!id.success || !secret.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'TOKEN_PREVIOUS_KEYS entries must look like <kid>:<secret of 32+ chars>',
        });
        return z.NEVER;
      }

      keys.push({ id: id.data, secret: secret.data });
    }

    return keys;
  });

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(3000),

    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('credential-core-backend'),

    BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

    // Upper bound for any single store call (Postgres, Redis connect).
    STORE_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5000),

    // Token signing
    TOKEN_SIGNING_KEY_ID: KeyIdSchema.default('k1'),
    TOKEN_SIGNING_SECRET: SigningSecretSchema,
    TOKEN_PREVIOUS_KEYS: PreviousKeysSchema,

    // Lifetimes
    SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(28800),
    RECOVERY_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(86400).default(1800),

    // Password policy
    PASSWORD_MIN_LENGTH: z.coerce.number().int().min(6).max(64).default(8),
    PASSWORD_MIN_ENTROPY_BITS: z.coerce.number().min(0).max(256).default(40),

    // Where the reset email links to; the token is appended as ?token=
    PASSWORD_RESET_URL: z.string().url().default('http://localhost:5173/reset-password'),

    // First-superuser bootstrap (idempotent, never in production)
    SEED_ON_START: BooleanFlagSchema,
    SEED_SUPERUSER_EMAIL: z.string().email().default('admin@example.com'),
    SEED_SUPERUSER_PASSWORD: z.string().default(''),
  })
  .refine((c) => c.RECOVERY_TOKEN_TTL_SECONDS < c.SESSION_TTL_SECONDS, {
    message: 'RECOVERY_TOKEN_TTL_SECONDS must be shorter than SESSION_TTL_SECONDS',
    path: ['RECOVERY_TOKEN_TTL_SECONDS'],
  })
  .refine((c) => !c.SEED_ON_START || c.SEED_SUPERUSER_PASSWORD.length > 0, {
    message: 'SEED_SUPERUSER_PASSWORD is required when SEED_ON_START=true',
    path: ['SEED_SUPERUSER_PASSWORD'],
  })
  .refine((c) => !c.TOKEN_PREVIOUS_KEYS.some((k) => k.id === c.TOKEN_SIGNING_KEY_ID), {
    message: 'TOKEN_PREVIOUS_KEYS must not reuse TOKEN_SIGNING_KEY_ID',
    path: ['TOKEN_PREVIOUS_KEYS'],
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;
  storeTimeoutMs: number;

  tokens: {
    activeKey: SigningKey;
    previousKeys: SigningKey[];
    sessionTtlSeconds: number;
    recoveryTtlSeconds: number;
  };

  passwordPolicy: {
    minLength: number;
    minEntropyBits: number;
  };

  passwordResetUrl: string;

  seed: {
    enabled: boolean;
    superuserEmail: string;
    superuserPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,

    tokens: {
      activeKey: { id: parsed.TOKEN_SIGNING_KEY_ID, secret: parsed.TOKEN_SIGNING_SECRET },
      previousKeys: parsed.TOKEN_PREVIOUS_KEYS,
      sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
      recoveryTtlSeconds: parsed.RECOVERY_TOKEN_TTL_SECONDS,
    },

    passwordPolicy: {
      minLength: parsed.PASSWORD_MIN_LENGTH,
      minEntropyBits: parsed.PASSWORD_MIN_ENTROPY_BITS,
    },

    passwordResetUrl: parsed.PASSWORD_RESET_URL,

    seed: {
      enabled: parsed.SEED_ON_START,
      superuserEmail: parsed.SEED_SUPERUSER_EMAIL,
      superuserPassword: parsed.SEED_SUPERUSER_PASSWORD,
    },
  };
}
