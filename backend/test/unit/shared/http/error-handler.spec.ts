import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { registerErrorHandler } from '../../../../src/shared/http/error-handler';
import { AppError } from '../../../../src/shared/http/errors';
import { RateLimitError } from '../../../../src/shared/security/rate-limit';
import { StoreUnavailableError } from '../../../../src/shared/db/store-errors';

describe('registerErrorHandler', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify({ logger: false });
    registerErrorHandler(app);

    app.get('/auth-failed', () => {
      throw AppError.authenticationFailed('Invalid email or password.', { password: 'x' });
    });
    app.get('/token', () => {
      throw AppError.invalidOrExpiredToken('bad link');
    });
    app.get('/weak', () => {
      throw AppError.weakPassword('too weak');
    });
    app.get('/conflict', () => {
      throw AppError.conflict('taken');
    });
    app.get('/rate', () => {
      throw new RateLimitError('rl:login:ip:1', 20, 900);
    });
    app.get('/store', () => {
      throw new StoreUnavailableError('credentials.findByEmail');
    });
    app.get('/boom', () => {
      throw new Error('secret internal detail');
    });
    app.post('/json', () => ({ ok: true }));

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it.each([
    ['/auth-failed', 401, 'AUTHENTICATION_FAILED', 'Invalid email or password.'],
    ['/token', 400, 'INVALID_OR_EXPIRED_TOKEN', 'bad link'],
    ['/weak', 400, 'WEAK_PASSWORD', 'too weak'],
    ['/conflict', 409, 'CONFLICT', 'taken'],
    ['/rate', 429, 'RATE_LIMITED', 'Too many requests. Try again later.'],
    ['/boom', 500, 'INTERNAL', 'Internal server error'],
  ])('%s → %i %s', async (url, status, code, message) => {
    const res = await app.inject({ method: 'GET', url });

    expect(res.statusCode).toBe(status);
    expect(res.json()).toEqual({ error: { code, message } });
  });

  it('maps StoreUnavailableError to 503 with Retry-After', async () => {
    const res = await app.inject({ method: 'GET', url: '/store' });

    expect(res.statusCode).toBe(503);
    expect(res.headers['retry-after']).toBe('1');
    expect(res.json()).toEqual({
      error: { code: 'STORE_UNAVAILABLE', message: 'Service temporarily unavailable. Try again.' },
    });
  });

  it('maps malformed JSON bodies to 400 VALIDATION_ERROR', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/json',
      headers: { 'content-type': 'application/json' },
      payload: '{"email":',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request' } });
  });
});
