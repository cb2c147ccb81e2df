/**
 * backend/src/modules/auth/helpers/email-log-fields.ts
 *
 * WHY:
 * - Auth flows log which account was targeted without writing the address:
 *   emailKey (sha256 of the normalised email) correlates attempts,
 *   emailDomain shows provider-level patterns.
 * - The same emailKey doubles as the rate-limit key suffix.
 *
 * RULES:
 * - Pure function.
 * - Never throws.
 */

import type { TokenHasher } from '../../../shared/security/token-hasher';
import { emailDomain, normalizeEmail } from '../../credentials';

export function emailLogFields(
  tokenHasher: TokenHasher,
  email: string,
): { emailKey: string; emailDomain: string } {
  const normalized = normalizeEmail(email);
  return {
    emailKey: tokenHasher.hash(normalized),
    emailDomain: emailDomain(normalized),
  };
}
