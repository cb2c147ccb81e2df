/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Random values (token nonces, throw-away passwords for timing padding)
 *   must come from the CSPRNG and be URL-safe.
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
