/**
 * backend/src/shared/db/seed/first-superuser-seed.ts
 *
 * Bootstrap seed: ensures a first superuser credential exists so a fresh
 * deployment can sign in at all.
 *
 * Idempotent: safe to run on every start (an existing email is left alone,
 * including its password).
 *
 * IMPORTANT:
 * - Goes through the same createCredential path as every other credential
 *   (password policy + hasher). No direct table writes.
 * - Never logs the password. build-app.ts refuses to run it in production.
 */

import { AppError } from '../../http/errors';
import type { Logger } from '../../logger/logger';

type SeedCredentialInput = {
  email: string;
  password: string;
  isSuperuser: boolean;
  requestId: string;
};

export type FirstSuperuserSeedResult = 'created' | 'exists';

export async function runFirstSuperuserSeed(opts: {
  findByEmail: (email: string) => Promise<{ id: string } | undefined>;
  createCredential: (input: SeedCredentialInput) => Promise<{ id: string }>;
  logger: Logger;
  options: { email: string; password: string };
}): Promise<FirstSuperuserSeedResult> {
  const flow = 'seed.superuser';

  const existing = await opts.findByEmail(opts.options.email);
  if (existing) {
    opts.logger.info('seed.superuser.exists', { flow, subjectId: existing.id });
    return 'exists';
  }

  try {
    const created = await opts.createCredential({
      email: opts.options.email,
      password: opts.options.password,
      isSuperuser: true,
      requestId: flow,
    });

    opts.logger.info('seed.superuser.created', { flow, subjectId: created.id });
    return 'created';
  } catch (err) {
    // Another instance seeded between our read and our insert.
    if (err instanceof AppError && err.code === 'CONFLICT') {
      opts.logger.info('seed.superuser.exists', { flow });
      return 'exists';
    }
    throw err;
  }
}
