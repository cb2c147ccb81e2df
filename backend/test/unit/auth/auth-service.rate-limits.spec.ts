import { describe, it, expect } from 'vitest';
import { RateLimitError } from '../../../src/shared/security/rate-limit';
import { buildTestDeps } from '../../helpers/build-test-deps';
import { buildTestConfig } from '../../helpers/test-config';

const PASSWORD = 'Correct-Horse-42';

function setup() {
  return buildTestDeps({ config: buildTestConfig({ nodeEnv: 'development' }) });
}

describe('AuthService rate limits (enabled outside test env)', () => {
  it('blocks the sixth login attempt for one email within the window', async () => {
    const { authService, clock } = setup();
    await authService.createCredential({ email: 'dave@example.com', password: PASSWORD });

    for (let i = 0; i < 5; i++) {
      await expect(
        authService.login({ email: 'dave@example.com', password: 'nope', ip: `198.51.100.${i}`, requestId: 'r' }),
      ).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED' });
    }

    await expect(
      authService.login({ email: 'dave@example.com', password: PASSWORD, ip: '198.51.100.99', requestId: 'r' }),
    ).rejects.toBeInstanceOf(RateLimitError);

    clock.advanceSeconds(900);
    await expect(
      authService.login({ email: 'dave@example.com', password: PASSWORD, ip: '198.51.100.99', requestId: 'r' }),
    ).resolves.toMatchObject({ token: expect.any(String) });
  });

  it('blocks the twenty-first login attempt from one IP', async () => {
    const { authService } = setup();

    for (let i = 0; i < 20; i++) {
      await expect(
        authService.login({ email: `user${i}@example.com`, password: 'nope', ip: '198.51.100.1', requestId: 'r' }),
      ).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED' });
    }

    await expect(
      authService.login({ email: 'user20@example.com', password: 'nope', ip: '198.51.100.1', requestId: 'r' }),
    ).rejects.toBeInstanceOf(RateLimitError);
  });

  it('silently stops sending reset emails after three per hour', async () => {
    const { authService, queue } = setup();
    await authService.createCredential({ email: 'dave@example.com', password: PASSWORD });

    for (let i = 0; i < 4; i++) {
      await expect(
        authService.requestPasswordReset({ email: 'dave@example.com', ip: '198.51.100.1', requestId: 'r' }),
      ).resolves.toBeUndefined();
    }

    expect(queue.drain()).toHaveLength(3);
  });

  it('blocks the sixth reset attempt from one IP', async () => {
    const { authService } = setup();

    for (let i = 0; i < 5; i++) {
      await expect(
        authService.resetPassword({ token: 'bogus', newPassword: 'Brand-New-Pass-77', ip: '198.51.100.1', requestId: 'r' }),
      ).rejects.toMatchObject({ code: 'INVALID_OR_EXPIRED_TOKEN' });
    }

    await expect(
      authService.resetPassword({ token: 'bogus', newPassword: 'Brand-New-Pass-77', ip: '198.51.100.1', requestId: 'r' }),
    ).rejects.toBeInstanceOf(RateLimitError);
  });
});
