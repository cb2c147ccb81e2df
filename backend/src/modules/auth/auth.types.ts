/**
 * backend/src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Result and failure types of the token components.
 * - Failure reasons are closed unions: the service narrows them to the public
 *   error kinds, logs keep the detail.
 *
 * RULES:
 * - Never include raw passwords or hashes in these types.
 */

import type { TokenVerifyFailureReason } from '../../shared/security/token-signer';

/** Stateless bearer credential returned by login. Not persisted. */
export type SessionToken = {
  token: string;
  subjectId: string;
  issuedAt: Date;
  expiresAt: Date;
};

export type SessionValidationFailureReason = TokenVerifyFailureReason;

export type SessionValidationResult =
  | { ok: true; subjectId: string }
  | { ok: false; reason: SessionValidationFailureReason };

export type RecoveryIssueResult =
  | { ok: true; token: string; subjectId: string; expiresAt: Date }
  | { ok: false; reason: 'not_found' | 'inactive' };

export type RecoveryConsumeFailureReason = TokenVerifyFailureReason | 'already_used';

export type RecoveryConsumeResult =
  | { ok: true; subjectId: string }
  | { ok: false; reason: RecoveryConsumeFailureReason };
