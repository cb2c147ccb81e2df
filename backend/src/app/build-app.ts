/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> infra -> deps -> server -> routes -> seed
 * - Makes E2E tests simple (pass in-memory infra, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, buildInfra, type AppInfra, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runFirstSuperuserSeed } from '../shared/db/seed/first-superuser-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(
  config: AppConfig,
  opts: { infra?: AppInfra; overrides?: DepsOverrides } = {},
) {
  const infra = opts.infra ?? (await buildInfra(config));
  const deps = buildDeps(config, infra, opts.overrides);
  const app = await buildServer({ deps });

  registerRoutes(app, { config, deps });

  // First-superuser bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.superuser';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      await runFirstSuperuserSeed({
        findByEmail: (email) => deps.credentialStore.findByEmail(email),
        createCredential: (input) => deps.auth.authService.createCredential(input),
        logger,
        options: {
          email: config.seed.superuserEmail,
          password: config.seed.superuserPassword,
        },
      });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
