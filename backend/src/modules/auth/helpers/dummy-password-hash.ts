/**
 * backend/src/modules/auth/helpers/dummy-password-hash.ts
 *
 * WHY:
 * - Login for an unknown email must cost the same as a wrong password.
 *   The flow verifies the submitted password against this hash, which was
 *   produced by the same hasher (so the same algorithm and cost).
 *
 * RULES:
 * - One hash per hasher instance, computed lazily on first use.
 * - The plaintext is random and discarded: nothing can ever verify against it.
 * - A failed computation is not cached.
 */

import type { PasswordHasher } from '../../../shared/security/password-hasher';
import { generateSecureToken } from '../../../shared/security/token';

const dummyHashes = new WeakMap<PasswordHasher, Promise<string>>();

export function getDummyPasswordHash(hasher: PasswordHasher): Promise<string> {
  const cached = dummyHashes.get(hasher);
  if (cached) return cached;

  const pending = hasher.hash(generateSecureToken());
  dummyHashes.set(hasher, pending);
  pending.catch(() => dummyHashes.delete(hasher));

  return pending;
}
