/**
 * backend/src/shared/http/bearer-auth.ts
 *
 * WHY:
 * - Reads `Authorization: Bearer <token>` once per request and resolves it to
 *   a subject through the injected authorizer (AuthService.authorize).
 * - Best effort: a missing or rejected token leaves the request anonymous;
 *   only handlers that call requireSubject() turn that into a 401.
 *
 * RULES:
 * - Must be registered after registerRequestContext/registerAuthContext.
 * - Only AUTHENTICATION_FAILED is absorbed. Anything else is a real failure
 *   and goes to the error handler.
 * - shared → no module imports: the authorizer is a plain function.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type BearerAuthorizer = (token: string, ctx: { requestId: string }) => string;

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

export function registerBearerAuth(app: FastifyInstance, authorize: BearerAuthorizer) {
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      done();
      return;
    }

    try {
      req.authContext.subjectId = authorize(token, {
        requestId: req.requestContext.requestId,
      });
      done();
    } catch (err) {
      if (err instanceof AppError && err.code === 'AUTHENTICATION_FAILED') {
        done();
        return;
      }
      done(err instanceof Error ? err : new Error(String(err)));
    }
  });
}
