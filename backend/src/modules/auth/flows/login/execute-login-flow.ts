/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating the timing-sensitive ordering.
 *
 * TIMING:
 * - Exactly one password verification per attempt, whatever happens:
 *   unknown email → verify against the dummy hash,
 *   disabled account → verify first, reject after.
 *   The three failure paths are indistinguishable by response or cost.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Rate limit before any store work.
 * - Never log the raw email, password, hash or token.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { CredentialStore } from '../../../credentials';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import type { SessionToken } from '../../auth.types';
import { getDummyPasswordHash } from '../../helpers/dummy-password-hash';
import { emailLogFields } from '../../helpers/email-log-fields';
import { evaluateLoginGating } from '../../policies/login-gating.policy';
import type { SessionTokenIssuer } from '../../tokens/session-token-issuer';

export type LoginParams = {
  email: string;
  password: string;
  ip: string;
  requestId: string;
};

export async function executeLoginFlow(
  deps: {
    credentialStore: CredentialStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    sessionTokens: SessionTokenIssuer;
    logger: Logger;
    rateLimiter: RateLimiter;
  },
  params: LoginParams,
): Promise<SessionToken> {
  const { emailKey, emailDomain } = emailLogFields(deps.tokenHasher, params.email);

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain,
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const credential = await deps.credentialStore.findByEmail(params.email);

  const hashToCheck = credential?.passwordHash ?? (await getDummyPasswordHash(deps.passwordHasher));
  const passwordValid = await deps.passwordHasher.verify(params.password, hashToCheck);

  const gate = evaluateLoginGating(credential, passwordValid);
  if (!gate.allowed) {
    deps.logger.info({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      reason: gate.failure.reason,
      subjectId: credential?.id ?? null,
      emailDomain,
      emailKey,
    });
    throw gate.failure.error;
  }

  const session = deps.sessionTokens.issue(gate.credential.id);

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    subjectId: gate.credential.id,
    expiresAt: session.expiresAt.toISOString(),
  });

  return session;
}
