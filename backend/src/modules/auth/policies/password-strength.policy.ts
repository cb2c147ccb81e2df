/**
 * WHY:
 * - New passwords (reset, change, create) must clear a configurable floor.
 * - Keep rule pure + unit-testable.
 *
 * RULES:
 * - Length counts code points, not UTF-16 units.
 * - Hard upper bound of 72 UTF-8 bytes: bcrypt ignores anything after that,
 *   so two passwords sharing a 72-byte prefix would verify as each other.
 * - Entropy estimate = length × log2(size of the character classes used).
 *   Deliberately crude: it is a floor against "aaaaaaaa", not a cracker model.
 */

import { AuthErrors } from '../auth.errors';
import {
  BCRYPT_MAX_PASSWORD_BYTES,
  exceedsBcryptLimit,
} from '../../../shared/security/bcrypt-password-hasher';

export type PasswordPolicy = Readonly<{
  minLength: number;
  minEntropyBits: number;
}>;

export type PasswordStrengthFailure = {
  reason: 'too_short' | 'too_long' | 'low_entropy';
  error: Error;
};

const CLASS_SIZES = {
  lower: 26,
  upper: 26,
  digit: 10,
  // printable ASCII that is not a letter or digit, space included
  symbol: 33,
  // anything outside ASCII; a rough stand-in for "large alphabet"
  other: 100,
} as const;

type CharClass = keyof typeof CLASS_SIZES;

function classify(char: string): CharClass {
  if (char >= 'a' && char <= 'z') return 'lower';
  if (char >= 'A' && char <= 'Z') return 'upper';
  if (char >= '0' && char <= '9') return 'digit';

  const code = char.codePointAt(0) ?? 0;
  if (code >= 0x20 && code <= 0x7e) return 'symbol';
  return 'other';
}

export function estimatePasswordEntropyBits(plain: string): number {
  const chars = Array.from(plain);
  if (chars.length === 0) return 0;

  const classes = new Set<CharClass>(chars.map(classify));
  let poolSize = 0;
  for (const c of classes) poolSize += CLASS_SIZES[c];

  return chars.length * Math.log2(poolSize);
}

export function getPasswordStrengthFailure(
  plain: string,
  policy: PasswordPolicy,
): PasswordStrengthFailure | null {
  if (Array.from(plain).length < policy.minLength) {
    return {
      reason: 'too_short',
      error: AuthErrors.weakPassword(
        `Password must be at least ${policy.minLength} characters.`,
      ),
    };
  }

  if (exceedsBcryptLimit(plain)) {
    return {
      reason: 'too_long',
      error: AuthErrors.weakPassword(
        `Password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes long.`,
      ),
    };
  }

  if (estimatePasswordEntropyBits(plain) < policy.minEntropyBits) {
    return {
      reason: 'low_entropy',
      error: AuthErrors.weakPassword(
        'Password is too easy to guess. Make it longer or mix letters, digits and symbols.',
      ),
    };
  }

  return null;
}

export function assertPasswordStrength(plain: string, policy: PasswordPolicy): void {
  const failure = getPasswordStrengthFailure(plain, policy);
  if (failure) throw failure.error;
}
