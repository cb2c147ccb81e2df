/**
 * backend/src/modules/auth/recovery/pg-recovery-consumption-store.ts
 *
 * WHY:
 * - Postgres-backed consumption record (see dal/recovery-consumption.repo.ts
 *   for the check-and-set itself).
 *
 * RULES:
 * - Every call goes through withStoreTimeout().
 */

import type { DbExecutor } from '../../../shared/db/db';
import { withStoreTimeout } from '../../../shared/db/store-errors';
import { RecoveryConsumptionRepo } from '../dal/recovery-consumption.repo';
import type { ConsumptionEntry, RecoveryConsumptionStore } from './recovery-consumption-store';

export class PgRecoveryConsumptionStore implements RecoveryConsumptionStore {
  private readonly repo: RecoveryConsumptionRepo;

  constructor(
    db: DbExecutor,
    private readonly timeoutMs: number,
  ) {
    this.repo = new RecoveryConsumptionRepo(db);
  }

  markConsumed(entry: ConsumptionEntry): Promise<boolean> {
    return withStoreTimeout('recovery.markConsumed', this.timeoutMs, () =>
      this.repo.insertIfAbsent({
        tokenIdHash: entry.tokenIdHash,
        credentialId: entry.subjectId,
        expiresAt: entry.expiresAt,
      }),
    );
  }

  purgeExpired(before: Date): Promise<number> {
    return withStoreTimeout('recovery.purgeExpired', this.timeoutMs, () =>
      this.repo.deleteExpiredBefore(before),
    );
  }
}
