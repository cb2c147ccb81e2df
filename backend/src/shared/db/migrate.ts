/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and deploy pipelines.
 * - Migrations are imported statically, so the same file works under tsx
 *   and from the compiled dist/ output.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import { Migrator, type Migration } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

import * as m0001 from './migrations/0001_credentials';
import * as m0002 from './migrations/0002_recovery_token_consumptions';

const MIGRATIONS: Record<string, Migration> = {
  '0001_credentials': m0001,
  '0002_recovery_token_consumptions': m0002,
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl, { timeoutMs: config.storeTimeoutMs });

  const migrator = new Migrator({
    db,
    provider: { getMigrations: () => Promise.resolve(MIGRATIONS) },
  });

  logger.info('migrations.start', { count: Object.keys(MIGRATIONS).length });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
