/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require a valid bearer token" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch the store or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

/**
 * Controller guard: returns the authenticated subject id or throws
 * AUTHENTICATION_FAILED ("Authentication required.").
 */
export function requireSubject(req: FastifyRequest): string {
  const subjectId = req.authContext?.subjectId;
  if (!subjectId) throw AppError.authenticationFailed('Authentication required.');
  return subjectId;
}
