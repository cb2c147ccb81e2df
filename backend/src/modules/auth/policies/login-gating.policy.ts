/**
 * WHY:
 * - Decides whether a login attempt may be granted a session.
 * - Keep rule pure + unit-testable.
 *
 * RULES:
 * - Every failure maps to the same AuthenticationFailed error (anti-enumeration).
 *   Only `reason` differs, and it goes to logs.
 * - Disabled status is only considered after the password verified: the
 *   caller must have paid for the full hash comparison first.
 */

import { AuthErrors } from '../auth.errors';

export type LoginCandidate = Readonly<{
  isActive: boolean;
}>;

export type LoginGatingFailure = {
  reason: 'credential_not_found' | 'wrong_password' | 'account_disabled';
  error: Error;
};

export type LoginGatingResult<T extends LoginCandidate> =
  | { allowed: true; credential: T }
  | { allowed: false; failure: LoginGatingFailure };

function denied(reason: LoginGatingFailure['reason']): { allowed: false; failure: LoginGatingFailure } {
  return { allowed: false, failure: { reason, error: AuthErrors.authenticationFailed() } };
}

/**
 * Evaluates the gate once and hands back the credential narrowed to
 * non-null when the login may proceed.
 */
export function evaluateLoginGating<T extends LoginCandidate>(
  credential: T | null | undefined,
  passwordValid: boolean,
): LoginGatingResult<T> {
  if (!credential) return denied('credential_not_found');
  if (!passwordValid) return denied('wrong_password');
  if (!credential.isActive) return denied('account_disabled');

  return { allowed: true, credential };
}

export function getLoginGatingFailure(input: {
  credential: LoginCandidate | null | undefined;
  passwordValid: boolean;
}): LoginGatingFailure | null {
  const result = evaluateLoginGating(input.credential, input.passwordValid);
  return result.allowed ? null : result.failure;
}
