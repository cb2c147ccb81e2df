/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId, host)
 * 2. auth context stub (anonymous)
 * 3. bearer auth (fills subjectId when a session token validates)
 * 4. request log line
 */

import Fastify from 'fastify';

import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerBearerAuth } from '../shared/http/bearer-auth';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerBearerAuth(app, (token, ctx) => opts.deps.auth.authService.authorize(token, ctx));

  registerErrorHandler(app);

  // Basic request logging (never includes headers: they carry the bearer token)
  app.addHook('onRequest', async (req) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      subjectId: req.authContext.subjectId,
    });
  });

  return app;
}
