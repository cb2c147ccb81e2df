/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Handlers need to know "who is calling" without re-parsing headers.
 * - Populated from the bearer token by registerBearerAuth(); null means
 *   anonymous (no header, or a token that did not validate).
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets the anonymous stub on every request.
 * 2. The bearer hook overwrites subjectId when a session token validates.
 * 3. Protected handlers call requireSubject(req).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  subjectId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = { subjectId: null };
    done();
  });
}
