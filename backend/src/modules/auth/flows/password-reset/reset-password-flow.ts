/**
 * backend/src/modules/auth/flows/password-reset/reset-password-flow.ts
 *
 * WHY:
 * - Deep module for redeeming a recovery token.
 *
 * ORDER:
 * 1. Rate limit per IP (hard 429).
 * 2. Password policy, before the token is touched: a weak password must not
 *    burn the user's link.
 * 3. consume(): signature, purpose, expiry, then the single-use check-and-set.
 * 4. Load the credential and overwrite its hash.
 *
 * RULES:
 * - Every token failure (invalid_signature, expired, malformed, already_used)
 *   becomes the same InvalidOrExpiredToken error; the reason is logged.
 * - No rollback: if step 4 fails the token stays consumed and the user asks
 *   for a new one.
 * - No auto-login after reset. The user proves the new password by signing in.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { CredentialStore } from '../../../credentials';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import {
  getPasswordStrengthFailure,
  type PasswordPolicy,
} from '../../policies/password-strength.policy';
import type { RecoveryTokenManager } from '../../recovery/recovery-token-manager';

export type ResetPasswordParams = {
  token: string;
  newPassword: string;
  ip: string;
  requestId: string;
};

export async function resetPasswordFlow(
  deps: {
    recoveryTokens: RecoveryTokenManager;
    credentialStore: CredentialStore;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    passwordPolicy: PasswordPolicy;
  },
  params: ResetPasswordParams,
): Promise<void> {
  const logBase = { flow: 'auth.password_reset.complete', requestId: params.requestId };

  // ── 1. Rate limit ────────────────────────────────────────
  await deps.rateLimiter.hitOrThrow({
    key: `reset:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.resetPassword.perIp,
  });

  // ── 2. Policy ────────────────────────────────────────────
  const weak = getPasswordStrengthFailure(params.newPassword, deps.passwordPolicy);
  if (weak) {
    deps.logger.info({ msg: 'auth.password_reset.rejected', ...logBase, reason: weak.reason });
    throw weak.error;
  }

  // ── 3. Consume ───────────────────────────────────────────
  const consumed = await deps.recoveryTokens.consume(params.token);
  if (!consumed.ok) {
    deps.logger.info({ msg: 'auth.password_reset.rejected', ...logBase, reason: consumed.reason });
    throw AuthErrors.resetTokenInvalid();
  }

  // ── 4. Overwrite hash ────────────────────────────────────
  const credential = await deps.credentialStore.findById(consumed.subjectId);
  if (!credential || !credential.isActive) {
    deps.logger.info({
      msg: 'auth.password_reset.rejected',
      ...logBase,
      reason: credential ? 'account_disabled' : 'credential_not_found',
      subjectId: consumed.subjectId,
    });
    throw AuthErrors.resetTokenInvalid();
  }

  const passwordHash = await deps.passwordHasher.hash(params.newPassword);
  const updated = await deps.credentialStore.updatePasswordHash({
    id: credential.id,
    passwordHash,
  });

  if (!updated) {
    deps.logger.info({
      msg: 'auth.password_reset.rejected',
      ...logBase,
      reason: 'credential_not_found',
      subjectId: credential.id,
    });
    throw AuthErrors.resetTokenInvalid();
  }

  deps.logger.info({ msg: 'auth.password_reset.completed', ...logBase, subjectId: credential.id });
}
