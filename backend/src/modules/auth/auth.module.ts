/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units:
 *   SessionTokenIssuer + RecoveryTokenManager → AuthService → controller.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here: the signer (and its secrets) is injected.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { TokenSigner } from '../../shared/security/token-signer';
import type { Clock } from '../../shared/time/clock';
import type { CredentialStore } from '../credentials';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import type { PasswordPolicy } from './policies/password-strength.policy';
import type { RecoveryConsumptionStore } from './recovery/recovery-consumption-store';
import { RecoveryTokenManager } from './recovery/recovery-token-manager';
import { SessionTokenIssuer } from './tokens/session-token-issuer';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  credentialStore: CredentialStore;
  consumptionStore: RecoveryConsumptionStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  signer: TokenSigner;
  clock: Clock;
  logger: Logger;
  rateLimiter: RateLimiter;
  queue: Queue;
  sessionTtlSeconds: number;
  recoveryTtlSeconds: number;
  passwordPolicy: PasswordPolicy;
  passwordResetUrl: string;
}) {
  const sessionTokens = new SessionTokenIssuer({
    signer: deps.signer,
    lifetimeSeconds: deps.sessionTtlSeconds,
    clock: deps.clock,
  });

  const recoveryTokens = new RecoveryTokenManager({
    signer: deps.signer,
    credentialStore: deps.credentialStore,
    consumptionStore: deps.consumptionStore,
    tokenHasher: deps.tokenHasher,
    lifetimeSeconds: deps.recoveryTtlSeconds,
    clock: deps.clock,
  });

  const authService = new AuthService({
    credentialStore: deps.credentialStore,
    passwordHasher: deps.passwordHasher,
    tokenHasher: deps.tokenHasher,
    sessionTokens,
    recoveryTokens,
    logger: deps.logger,
    rateLimiter: deps.rateLimiter,
    queue: deps.queue,
    passwordPolicy: deps.passwordPolicy,
    passwordResetUrl: deps.passwordResetUrl,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    sessionTokens,
    recoveryTokens,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
