import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp, readJson, type ErrorResponseBody } from '../helpers/build-test-app';

const PASSWORD = 'Correct-Horse-42';
const NEW_PASSWORD = 'Brand-New-Pass-77';

describe('POST /auth/change-password', () => {
  let t: Awaited<ReturnType<typeof buildTestApp>>;
  let accessToken: string;

  beforeEach(async () => {
    t = await buildTestApp();
    await t.deps.auth.authService.createCredential({
      email: 'carol@example.com',
      password: PASSWORD,
    });

    const login = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { email: 'carol@example.com', password: PASSWORD },
    });
    accessToken = readJson<{ accessToken: string }>(login).accessToken;
  });

  afterEach(async () => {
    await t.close();
  });

  function change(body: { currentPassword: string; newPassword: string }, token?: string) {
    return t.app.inject({
      method: 'POST',
      url: '/auth/change-password',
      payload: body,
      headers: token ? { authorization: `Bearer ${token}` } : {},
    });
  }

  it('changes the password for the bearer of a valid session', async () => {
    const res = await change({ currentPassword: PASSWORD, newPassword: NEW_PASSWORD }, accessToken);

    expect(res.statusCode).toBe(200);
    expect(readJson<{ message: string }>(res)).toEqual({ message: 'Password updated successfully.' });

    const relogin = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { email: 'carol@example.com', password: NEW_PASSWORD },
    });
    expect(relogin.statusCode).toBe(200);
  });

  it('requires a session', async () => {
    const res = await change({ currentPassword: PASSWORD, newPassword: NEW_PASSWORD });

    expect(res.statusCode).toBe(401);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe('Authentication required.');
  });

  it('rejects a wrong current password with 400', async () => {
    const res = await change(
      { currentPassword: 'Wrong-Horse-42', newPassword: NEW_PASSWORD },
      accessToken,
    );

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorResponseBody>(res)).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Incorrect password.' },
    });
  });
});
