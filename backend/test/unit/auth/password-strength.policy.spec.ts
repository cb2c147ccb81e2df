import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  estimatePasswordEntropyBits,
  getPasswordStrengthFailure,
  assertPasswordStrength,
} from '../../../src/modules/auth/policies/password-strength.policy';

const policy = { minLength: 8, minEntropyBits: 40 };

describe('estimatePasswordEntropyBits', () => {
  it('is zero for an empty string', () => {
    expect(estimatePasswordEntropyBits('')).toBe(0);
  });

  it('multiplies length by log2 of the pooled class sizes', () => {
    expect(estimatePasswordEntropyBits('password')).toBeCloseTo(8 * Math.log2(26), 6);
    expect(estimatePasswordEntropyBits('Password')).toBeCloseTo(8 * Math.log2(52), 6);
    expect(estimatePasswordEntropyBits('aB3!')).toBeCloseTo(4 * Math.log2(95), 6);
  });
});

describe('getPasswordStrengthFailure', () => {
  it('accepts a password above both floors', () => {
    expect(getPasswordStrengthFailure('Password', policy)).toBeNull();
  });

  it('rejects passwords shorter than the minimum length', () => {
    const failure = getPasswordStrengthFailure('short1', policy);

    expect(failure?.reason).toBe('too_short');
    expect(failure?.error).toBeInstanceOf(AppError);
    expect(failure?.error).toMatchObject({
      code: 'WEAK_PASSWORD',
      message: 'Password must be at least 8 characters.',
    });
  });

  it('counts code points, not UTF-16 units', () => {
    const eightEmoji = '\u{1F600}'.repeat(8);
    expect(eightEmoji.length).toBe(16);

    expect(getPasswordStrengthFailure(eightEmoji, { minLength: 9, minEntropyBits: 0 })?.reason).toBe(
      'too_short',
    );
  });

  it('rejects low-entropy passwords that are long enough', () => {
    const failure = getPasswordStrengthFailure('password', policy);

    expect(failure?.reason).toBe('low_entropy');
    expect(failure?.error).toMatchObject({ code: 'WEAK_PASSWORD' });
  });

  it('rejects passwords longer than 72 UTF-8 bytes', () => {
    expect(getPasswordStrengthFailure('a'.repeat(73), policy)?.reason).toBe('too_long');
    // 37 × 2-byte characters = 74 bytes
    expect(getPasswordStrengthFailure('\u00e9'.repeat(37), policy)?.reason).toBe('too_long');
  });

  it('accepts exactly 72 bytes', () => {
    expect(getPasswordStrengthFailure('\u00e9'.repeat(36), policy)).toBeNull();
  });

  it('uses the configured floors', () => {
    expect(getPasswordStrengthFailure('password', { minLength: 8, minEntropyBits: 30 })).toBeNull();
    expect(getPasswordStrengthFailure('Password', { minLength: 12, minEntropyBits: 0 })?.reason).toBe(
      'too_short',
    );
  });
});

describe('assertPasswordStrength', () => {
  it('throws the failure error', () => {
    expect(() => assertPasswordStrength('password', policy)).toThrow(
      'Password is too easy to guess. Make it longer or mix letters, digits and symbols.',
    );
  });

  it('returns for a strong password', () => {
    expect(() => assertPasswordStrength('Password', policy)).not.toThrow();
  });
});
