/**
 * backend/src/modules/auth/recovery/inmem-recovery-consumption-store.ts
 *
 * WHY:
 * - Single-process consumption record for tests and local runs.
 *
 * RULES:
 * - The has/set pair runs synchronously before the returned promise settles,
 *   so two racing consume() calls cannot both observe "unused".
 */

import type { ConsumptionEntry, RecoveryConsumptionStore } from './recovery-consumption-store';

export class InMemRecoveryConsumptionStore implements RecoveryConsumptionStore {
  private readonly entries = new Map<string, ConsumptionEntry>();

  markConsumed(entry: ConsumptionEntry): Promise<boolean> {
    if (this.entries.has(entry.tokenIdHash)) return Promise.resolve(false);

    this.entries.set(entry.tokenIdHash, { ...entry });
    return Promise.resolve(true);
  }

  purgeExpired(before: Date): Promise<number> {
    let purged = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt.getTime() < before.getTime()) {
        this.entries.delete(key);
        purged += 1;
      }
    }
    return Promise.resolve(purged);
  }

  get size(): number {
    return this.entries.size;
  }
}
