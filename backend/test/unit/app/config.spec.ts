import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

const SECRET = 'test-secret-test-secret-test-secret-0001';

function env(overrides: Record<string, string> = {}): NodeJS.ProcessEnv {
  return {
    DATABASE_URL: 'postgres://localhost/test',
    REDIS_URL: 'redis://localhost:6379',
    TOKEN_SIGNING_SECRET: SECRET,
    ...overrides,
  };
}

describe('buildConfig', () => {
  it('applies documented defaults', () => {
    const config = buildConfig(env());

    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.bcryptCost).toBe(12);
    expect(config.storeTimeoutMs).toBe(5000);
    expect(config.tokens).toEqual({
      activeKey: { id: 'k1', secret: SECRET },
      previousKeys: [],
      sessionTtlSeconds: 28800,
      recoveryTtlSeconds: 1800,
    });
    expect(config.passwordPolicy).toEqual({ minLength: 8, minEntropyBits: 40 });
    expect(config.passwordResetUrl).toBe('http://localhost:5173/reset-password');
    expect(config.seed.enabled).toBe(false);
  });

  it('parses previous signing keys (secrets may contain ":")', () => {
    const config = buildConfig(
      env({
        TOKEN_SIGNING_KEY_ID: 'k3',
        TOKEN_PREVIOUS_KEYS: `k2:${SECRET}:x, k1:${SECRET}`,
      }),
    );

    expect(config.tokens.activeKey.id).toBe('k3');
    expect(config.tokens.previousKeys).toEqual([
      { id: 'k2', secret: `${SECRET}:x` },
      { id: 'k1', secret: SECRET },
    ]);
  });

  it('rejects a previous key without a secret', () => {
    expect(() => buildConfig(env({ TOKEN_PREVIOUS_KEYS: 'k0' }))).toThrow(
      'TOKEN_PREVIOUS_KEYS entries must look like <kid>:<secret of 32+ chars>',
    );
  });

  it('rejects a previous key that reuses the active key id', () => {
    expect(() => buildConfig(env({ TOKEN_PREVIOUS_KEYS: `k1:${SECRET}` }))).toThrow(
      'TOKEN_PREVIOUS_KEYS must not reuse TOKEN_SIGNING_KEY_ID',
    );
  });

  it('rejects a short signing secret', () => {
    expect(() => buildConfig(env({ TOKEN_SIGNING_SECRET: 'too-short' }))).toThrow(
      'Token signing secrets must be at least 32 characters',
    );
  });

  it('requires the recovery lifetime to be shorter than the session lifetime', () => {
    expect(() =>
      buildConfig(env({ SESSION_TTL_SECONDS: '3600', RECOVERY_TOKEN_TTL_SECONDS: '3600' })),
    ).toThrow('RECOVERY_TOKEN_TTL_SECONDS must be shorter than SESSION_TTL_SECONDS');
  });

  it('reads SEED_ON_START="false" as false', () => {
    expect(buildConfig(env({ SEED_ON_START: 'false' })).seed.enabled).toBe(false);
  });

  it('requires a seed password when seeding is on', () => {
    expect(() => buildConfig(env({ SEED_ON_START: 'true' }))).toThrow(
      'SEED_SUPERUSER_PASSWORD is required when SEED_ON_START=true',
    );
  });

  it('fails without DATABASE_URL', () => {
    const { DATABASE_URL: _omit, ...rest } = env();
    expect(() => buildConfig(rest)).toThrow();
  });
});
