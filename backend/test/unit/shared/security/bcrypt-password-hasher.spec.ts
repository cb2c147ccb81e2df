import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from '../../../../src/shared/security/bcrypt-password-hasher';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: 4 });

  it('verifies a password against its own hash', async () => {
    const hash = await hasher.hash('Correct-Horse-1');
    await expect(hasher.verify('Correct-Horse-1', hash)).resolves.toBe(true);
  });

  it('rejects a different password', async () => {
    const hash = await hasher.hash('Correct-Horse-1');
    await expect(hasher.verify('Correct-Horse-2', hash)).resolves.toBe(false);
  });

  it('salts every hash (same input, different output)', async () => {
    const a = await hasher.hash('Correct-Horse-1');
    const b = await hasher.hash('Correct-Horse-1');

    expect(a).not.toBe(b);
    await expect(hasher.verify('Correct-Horse-1', b)).resolves.toBe(true);
  });

  it('encodes algorithm and cost in the hash', async () => {
    const hash = await hasher.hash('Correct-Horse-1');
    expect(hash.startsWith('$2b$04$')).toBe(true);
    expect(hash).toHaveLength(60);
  });

  it.each([
    ['empty string', ''],
    ['plain text', 'not-a-hash'],
    ['truncated bcrypt hash', '$2b$04$abcdefghijklmnopqrstuv'],
    ['unknown algorithm prefix', `$argon2id$v=19$m=65536,t=3,p=4$${'a'.repeat(43)}`],
  ])('returns false (no throw) for a malformed stored hash: %s', async (_label, stored) => {
    await expect(hasher.verify('Correct-Horse-1', stored)).resolves.toBe(false);
  });

  describe('72-byte input limit', () => {
    const prefix72 = 'x'.repeat(72);

    it('hashes and verifies input of exactly 72 bytes', async () => {
      const hash = await hasher.hash(prefix72);
      await expect(hasher.verify(prefix72, hash)).resolves.toBe(true);
    });

    it('refuses to hash input longer than 72 bytes', async () => {
      await expect(hasher.hash(`${prefix72}first`)).rejects.toThrow(
        'BcryptPasswordHasher: input exceeds 72 bytes',
      );
    });

    it('does not verify a longer password against the hash of its 72-byte prefix', async () => {
      const hash = await hasher.hash(prefix72);
      await expect(hasher.verify(`${prefix72}second`, hash)).resolves.toBe(false);
    });

    it('counts UTF-8 bytes, not characters', async () => {
      // 36 two-byte characters = 72 bytes; one more is 74.
      const twoByte = '\u00e9'.repeat(36);
      const hash = await hasher.hash(twoByte);

      await expect(hasher.verify(twoByte, hash)).resolves.toBe(true);
      await expect(hasher.hash(`${twoByte}\u00e9`)).rejects.toThrow(
        'BcryptPasswordHasher: input exceeds 72 bytes',
      );
    });
  });
});
