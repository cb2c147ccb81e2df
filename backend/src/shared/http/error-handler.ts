/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - The core raises transport-agnostic errors; this is the ONE place that
 *   maps them to HTTP status codes.
 * - Internal details (meta, stack traces, failure reasons) must never leak.
 *
 * MAPPING:
 * - AUTHENTICATION_FAILED     → 401
 * - INVALID_OR_EXPIRED_TOKEN  → 400
 * - WEAK_PASSWORD             → 400
 * - VALIDATION_ERROR          → 400
 * - CONFLICT                  → 409
 * - RateLimitError            → 429
 * - StoreUnavailableError     → 503 + Retry-After (the only retryable kind)
 * - Fastify 4xx errors       → same status, VALIDATION_ERROR
 * - anything else             → 500
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (with REDACTED meta) via withRequestContext(req).
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError, type AppErrorCode } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { StoreUnavailableError } from '../db/store-errors';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

export const APP_ERROR_STATUS: Record<AppErrorCode, number> = {
  AUTHENTICATION_FAILED: 401,
  INVALID_OR_EXPIRED_TOKEN: 400,
  WEAK_PASSWORD: 400,
  VALIDATION_ERROR: 400,
  CONFLICT: 409,
};

export const STORE_RETRY_AFTER_SECONDS = 1;

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'password',
  'currentPassword',
  'newPassword',
  'passwordHash',
  'resetToken',
  'resetLink',
  'secret',
  'email',
]);

function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const status = APP_ERROR_STATUS[err.code];

      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Transient store failures: safe to retry
    if (err instanceof StoreUnavailableError) {
      log.error('store_unavailable', {
        flow: 'http.error',
        operation: err.operation,
        cause: err.cause instanceof Error ? err.cause.message : undefined,
      });

      return reply
        .status(503)
        .header('Retry-After', String(STORE_RETRY_AFTER_SECONDS))
        .send(buildResponse('STORE_UNAVAILABLE', 'Service temporarily unavailable. Try again.'));
    }

    // 4) Fastify's own client errors (malformed JSON, wrong content type, ...)
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, message: err.message });

      return reply.status(clientStatus).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 5) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
