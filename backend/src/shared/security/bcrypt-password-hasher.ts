/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a CPU-hard, salted password KDF.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 *
 * NOTES:
 * - Output format: $2b$<cost>$<22-char salt><31-char digest> (salt and
 *   algorithm travel inside the string).
 * - bcrypt only reads the first 72 bytes of input. hash() refuses longer
 *   input and verify() answers false for it, so two passwords sharing a
 *   72-byte prefix never verify as each other. The password policy rejects
 *   them earlier with a user-facing message.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export const BCRYPT_MAX_PASSWORD_BYTES = 72;

const BCRYPT_HASH_PATTERN = /^\$2[abxy]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export function exceedsBcryptLimit(plain: string): boolean {
  return Buffer.byteLength(plain, 'utf8') > BCRYPT_MAX_PASSWORD_BYTES;
}

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    if (exceedsBcryptLimit(plain)) {
      throw new Error(`BcryptPasswordHasher: input exceeds ${BCRYPT_MAX_PASSWORD_BYTES} bytes`);
    }
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    if (exceedsBcryptLimit(plain)) return false;
    if (!BCRYPT_HASH_PATTERN.test(hash)) return false;

    try {
      return await bcrypt.compare(plain, hash);
    } catch {
      // Corrupt salt/cost segment that still matched the pattern.
      return false;
    }
  }
}
