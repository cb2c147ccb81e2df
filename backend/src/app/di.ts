/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Split in two so tests can swap infrastructure without touching wiring:
 *   - buildInfra(): stores, cache, queue (Postgres + Redis in dev/prod)
 *   - buildDeps(): everything above infra (hashers, signer, modules)
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { Sha256TokenHasher, type TokenHasher } from '../shared/security/token-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { TokenSigner } from '../shared/security/token-signer';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { LoggingQueue } from '../shared/messaging/logging-queue';
import type { Queue } from '../shared/messaging/queue';

import { systemClock, type Clock } from '../shared/time/clock';

import { createCredentialModule } from '../modules/credentials/credential.module';
import type { CredentialStore } from '../modules/credentials';

import { PgRecoveryConsumptionStore } from '../modules/auth/recovery/pg-recovery-consumption-store';
import type { RecoveryConsumptionStore } from '../modules/auth/recovery/recovery-consumption-store';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppInfra = {
  cache: Cache;
  credentialStore: CredentialStore;
  consumptionStore: RecoveryConsumptionStore;
  queue: Queue;
  close: () => Promise<void>;
};

export type AppDeps = {
  logger: Logger;
  clock: Clock;

  cache: Cache;
  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  signer: TokenSigner;

  credentialStore: CredentialStore;
  consumptionStore: RecoveryConsumptionStore;

  // messaging
  queue: Queue;

  // modules
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  clock?: Clock;
  passwordHasher?: PasswordHasher;
};

export async function buildInfra(config: AppConfig): Promise<AppInfra> {
  const db = createDb(config.databaseUrl, { timeoutMs: config.storeTimeoutMs });

  // Redis is mandatory (dev + prod)
  const redis = await RedisCache.connect(config.redisUrl, {
    connectTimeoutMs: config.storeTimeoutMs,
  });

  const credentials = createCredentialModule({ db, storeTimeoutMs: config.storeTimeoutMs });
  const consumptionStore = new PgRecoveryConsumptionStore(db, config.storeTimeoutMs);

  // No mail transport in this service: the queue logs (and outside production
  // prints the reset link). Swap for a real adapter here.
  const queue: Queue = new LoggingQueue(logger, {
    exposeLinks: config.nodeEnv !== 'production',
  });

  return {
    cache: redis,
    credentialStore: credentials.credentialStore,
    consumptionStore,
    queue,
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}

export function buildDeps(
  config: AppConfig,
  infra: AppInfra,
  overrides: DepsOverrides = {},
): AppDeps {
  const clock = overrides.clock ?? systemClock;

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  const signer = new TokenSigner({
    active: config.tokens.activeKey,
    previous: config.tokens.previousKeys,
  });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(infra.cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // modules (no HTTP / no business logic here)
  const auth = createAuthModule({
    credentialStore: infra.credentialStore,
    consumptionStore: infra.consumptionStore,
    passwordHasher,
    tokenHasher,
    signer,
    clock,
    logger,
    rateLimiter,
    queue: infra.queue,
    sessionTtlSeconds: config.tokens.sessionTtlSeconds,
    recoveryTtlSeconds: config.tokens.recoveryTtlSeconds,
    passwordPolicy: config.passwordPolicy,
    passwordResetUrl: config.passwordResetUrl,
  });

  return {
    logger,
    clock,
    cache: infra.cache,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    signer,
    credentialStore: infra.credentialStore,
    consumptionStore: infra.consumptionStore,
    queue: infra.queue,
    auth,
    close: infra.close,
  };
}
