/**
 * backend/src/modules/auth/flows/password-reset/request-password-reset-flow.ts
 *
 * WHY:
 * - Deep module for the "forgot password" use-case.
 * - Anti-enumeration: the caller gets the same void result whether the
 *   account exists, is disabled, or the email is rate limited.
 *
 * RULES:
 * - Always resolves (infrastructure failures aside).
 * - The email hand-off is fire-and-forget: delivery latency or failure must
 *   not show up in the response time. Enqueue errors are logged, not thrown.
 * - The raw token only leaves this function inside the reset link.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { Queue } from '../../../../shared/messaging/queue';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { emailLogFields } from '../../helpers/email-log-fields';
import type { RecoveryTokenManager } from '../../recovery/recovery-token-manager';
import { normalizeEmail } from '../../../credentials';

export type RequestPasswordResetParams = {
  email: string;
  ip: string;
  requestId: string;
};

export function buildResetLink(resetUrl: string, token: string): string {
  const url = new URL(resetUrl);
  url.searchParams.set('token', token);
  return url.toString();
}

export async function requestPasswordResetFlow(
  deps: {
    recoveryTokens: RecoveryTokenManager;
    tokenHasher: TokenHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    queue: Queue;
    passwordResetUrl: string;
  },
  params: RequestPasswordResetParams,
): Promise<void> {
  const { emailKey, emailDomain } = emailLogFields(deps.tokenHasher, params.email);
  const logBase = {
    flow: 'auth.password_reset.request',
    requestId: params.requestId,
    emailDomain,
    emailKey,
  };

  // ── 1. Silent rate limit ─────────────────────────────────
  const withinLimit = await deps.rateLimiter.hitOrSkip({
    key: `forgot:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.forgotPassword.perEmail,
  });

  if (!withinLimit) {
    deps.logger.info({ msg: 'auth.password_reset.requested', ...logBase, outcome: 'rate_limited' });
    return;
  }

  // ── 2. Issue (or pretend to) ─────────────────────────────
  const issued = await deps.recoveryTokens.issueFor(params.email);

  if (!issued.ok) {
    deps.logger.info({ msg: 'auth.password_reset.requested', ...logBase, outcome: issued.reason });
    return;
  }

  // ── 3. Hand off to the email transport, do not wait ─────
  void deps.queue
    .enqueue({
      type: 'auth.reset-password-email',
      subjectId: issued.subjectId,
      email: normalizeEmail(params.email),
      resetLink: buildResetLink(deps.passwordResetUrl, issued.token),
      expiresAt: issued.expiresAt.toISOString(),
    })
    .catch((err: unknown) => {
      deps.logger.error({
        msg: 'auth.password_reset.enqueue_failed',
        ...logBase,
        subjectId: issued.subjectId,
        err,
      });
    });

  deps.logger.info({
    msg: 'auth.password_reset.requested',
    ...logBase,
    outcome: 'issued',
    subjectId: issued.subjectId,
  });
}
