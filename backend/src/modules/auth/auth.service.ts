/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - The only component other layers call for credentials: login, per-request
 *   authorization, password recovery, credential creation and password change.
 * - Narrows every internal failure reason into the small public error set:
 *   AUTHENTICATION_FAILED, INVALID_OR_EXPIRED_TOKEN, WEAK_PASSWORD,
 *   VALIDATION_ERROR, CONFLICT. StoreUnavailableError and RateLimitError pass
 *   through untouched.
 *
 * RULES:
 * - Thin: each use-case lives in flows/.
 * - Never store/log raw passwords or tokens.
 * - Rate limit at the start of each flow (before any store work).
 */

import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { CredentialStore, CredentialSummary } from '../credentials';

import { AuthErrors } from './auth.errors';
import type { SessionToken } from './auth.types';
import type { PasswordPolicy } from './policies/password-strength.policy';
import type { RecoveryTokenManager } from './recovery/recovery-token-manager';
import type { SessionTokenIssuer } from './tokens/session-token-issuer';

import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import {
  requestPasswordResetFlow,
  type RequestPasswordResetParams,
} from './flows/password-reset/request-password-reset-flow';
import {
  resetPasswordFlow,
  type ResetPasswordParams,
} from './flows/password-reset/reset-password-flow';
import {
  createCredentialFlow,
  type CreateCredentialParams,
} from './flows/credentials/create-credential-flow';
import {
  changePasswordFlow,
  type ChangePasswordParams,
} from './flows/credentials/change-password-flow';

export type {
  LoginParams,
  RequestPasswordResetParams,
  ResetPasswordParams,
  CreateCredentialParams,
  ChangePasswordParams,
};

export type AuthServiceDeps = {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  sessionTokens: SessionTokenIssuer;
  recoveryTokens: RecoveryTokenManager;
  logger: Logger;
  rateLimiter: RateLimiter;
  queue: Queue;
  passwordPolicy: PasswordPolicy;
  passwordResetUrl: string;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  login(params: LoginParams): Promise<SessionToken> {
    return executeLoginFlow(this.deps, params);
  }

  /**
   * Per-request bearer check. Synchronous: no store access, no shared state.
   * Which check failed is logged, never returned.
   */
  authorize(token: string, ctx: { requestId?: string } = {}): string {
    const result = this.deps.sessionTokens.validate(token);

    if (!result.ok) {
      this.deps.logger.info({
        msg: 'auth.authorize.failed',
        flow: 'auth.authorize',
        requestId: ctx.requestId ?? null,
        reason: result.reason,
      });
      throw AuthErrors.authenticationFailed();
    }

    return result.subjectId;
  }

  requestPasswordReset(params: RequestPasswordResetParams): Promise<void> {
    return requestPasswordResetFlow(this.deps, params);
  }

  resetPassword(params: ResetPasswordParams): Promise<void> {
    return resetPasswordFlow(this.deps, params);
  }

  createCredential(params: CreateCredentialParams): Promise<CredentialSummary> {
    return createCredentialFlow(this.deps, params);
  }

  changePassword(params: ChangePasswordParams): Promise<void> {
    return changePasswordFlow(this.deps, params);
  }
}
