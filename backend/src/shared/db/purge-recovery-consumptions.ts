/**
 * backend/src/shared/db/purge-recovery-consumptions.ts
 *
 * WHY:
 * - Consumption records are only needed while the token they guard could
 *   still verify. Once expires_at has passed they are garbage.
 *
 * HOW TO USE:
 * - npm run db:purge-consumptions --workspace backend  (cron / scheduled job)
 */

import 'dotenv/config';

import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';
import { PgRecoveryConsumptionStore } from '../../modules/auth/recovery/pg-recovery-consumption-store';

async function purge(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl, { timeoutMs: config.storeTimeoutMs });

  try {
    const store = new PgRecoveryConsumptionStore(db, config.storeTimeoutMs);
    const purged = await store.purgeExpired(new Date());

    logger.info('recovery_consumptions.purged', { flow: 'maintenance', purged });
  } finally {
    await db.destroy();
  }
}

void purge().catch((err: unknown) => {
  logger.error('recovery_consumptions.purge_failed', { flow: 'maintenance', err });
  process.exit(1);
});
