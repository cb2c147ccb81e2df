/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * CONTRACT:
 * - hash(): salted, slow, one-way. Two calls with the same input return
 *   different strings (fresh salt each time).
 * - verify(): consistent with whatever hash() produced; returns false (never
 *   throws) for a malformed stored hash; comparison time does not depend on
 *   where a mismatch occurs.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
