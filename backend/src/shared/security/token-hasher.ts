/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Raw identifiers that must not sit in plain form in a store or a log line
 *   are hashed first:
 *   - recovery token ids (jti) in the consumption record,
 *   - emails in rate-limit keys and operational logs.
 * - Inputs are high-entropy or only need to be non-reversible at a glance,
 *   so a fast deterministic digest is enough (unlike passwords).
 *
 * RULES:
 * - Deterministic: same input → same output (required for lookups).
 */

import { createHash } from 'node:crypto';

export interface TokenHasher {
  hash(raw: string): string;
}

export class Sha256TokenHasher implements TokenHasher {
  hash(raw: string): string {
    return createHash('sha256').update(raw).digest('hex');
  }
}
