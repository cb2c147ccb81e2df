import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StoreUnavailableError } from '../../src/shared/db/store-errors';
import { buildTestApp, readJson, type ErrorResponseBody } from '../helpers/build-test-app';
import { tokenWithRawPayload } from '../helpers/crafted-tokens';

const PASSWORD = 'Correct-Horse-42';

type LoginResponse = { accessToken: string; tokenType: string; expiresAt: string };

describe('auth login + session (HTTP)', () => {
  let t: Awaited<ReturnType<typeof buildTestApp>>;
  let aliceId: string;

  beforeEach(async () => {
    t = await buildTestApp();
    const alice = await t.deps.auth.authService.createCredential({
      email: 'alice@example.com',
      password: PASSWORD,
    });
    aliceId = alice.id;
  });

  afterEach(async () => {
    await t.close();
  });

  async function login(email: string, password: string) {
    return t.app.inject({ method: 'POST', url: '/auth/login', payload: { email, password } });
  }

  it('POST /auth/login returns a bearer token', async () => {
    const res = await login('alice@example.com', PASSWORD);

    expect(res.statusCode).toBe(200);
    const body = readJson<LoginResponse>(res);
    expect(body.tokenType).toBe('bearer');
    expect(body.expiresAt).toBe('2026-01-15T11:00:00.000Z');
    expect(body.accessToken.split('.')).toHaveLength(3);
  });

  it('gives the same 401 for a wrong password and an unknown email', async () => {
    const wrong = await login('alice@example.com', 'Wrong-Horse-42');
    const unknown = await login('nobody@example.com', PASSWORD);

    expect(wrong.statusCode).toBe(401);
    expect(unknown.statusCode).toBe(401);
    expect(readJson<ErrorResponseBody>(wrong)).toEqual({
      error: { code: 'AUTHENTICATION_FAILED', message: 'Invalid email or password.' },
    });
    expect(unknown.body).toBe(wrong.body);
  });

  it('gives the same 401 for a disabled account', async () => {
    t.credentialStore.setActive(aliceId, false);

    const res = await login('alice@example.com', PASSWORD);

    expect(res.statusCode).toBe(401);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe('Invalid email or password.');
  });

  it('rejects an invalid body with 400', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { email: 'not-an-email', password: '' },
    });

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorResponseBody>(res)).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
    });
  });

  it('GET /auth/session resolves the bearer token to its subject', async () => {
    const { accessToken } = readJson<LoginResponse>(await login('alice@example.com', PASSWORD));

    const res = await t.app.inject({
      method: 'GET',
      url: '/auth/session',
      headers: { authorization: `Bearer ${accessToken}` },
    });

    expect(res.statusCode).toBe(200);
    expect(readJson<{ subjectId: string }>(res)).toEqual({ subjectId: aliceId });
  });

  it('GET /auth/session is 401 without a token, with a bad token, and after expiry', async () => {
    const { accessToken } = readJson<LoginResponse>(await login('alice@example.com', PASSWORD));

    const none = await t.app.inject({ method: 'GET', url: '/auth/session' });
    const bad = await t.app.inject({
      method: 'GET',
      url: '/auth/session',
      headers: { authorization: 'Bearer not.a.token' },
    });

    t.clock.advanceSeconds(3600);
    const expired = await t.app.inject({
      method: 'GET',
      url: '/auth/session',
      headers: { authorization: `Bearer ${accessToken}` },
    });

    for (const res of [none, bad, expired]) {
      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'AUTHENTICATION_FAILED', message: 'Authentication required.' },
      });
    }
  });

  it('treats a bearer token with an unparseable payload as anonymous (401, not 500)', async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: '/auth/session',
      headers: { authorization: `Bearer ${tokenWithRawPayload('not-json')}` },
    });

    expect(res.statusCode).toBe(401);
    expect(readJson<ErrorResponseBody>(res)).toEqual({
      error: { code: 'AUTHENTICATION_FAILED', message: 'Authentication required.' },
    });
  });

  it('does not let such a token break public routes', async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: '/health',
      headers: { authorization: `Bearer ${tokenWithRawPayload('not-json')}` },
    });

    expect(res.statusCode).toBe(200);
  });

  it('answers 503 with Retry-After when the credential store is unavailable', async () => {
    vi.spyOn(t.credentialStore, 'findByEmail').mockRejectedValue(
      new StoreUnavailableError('credentials.findByEmail'),
    );

    const res = await login('alice@example.com', PASSWORD);

    expect(res.statusCode).toBe(503);
    expect(res.headers['retry-after']).toBe('1');
    expect(readJson<ErrorResponseBody>(res).error.code).toBe('STORE_UNAVAILABLE');
  });
});
