/**
 * backend/src/modules/auth/dal/recovery-consumption.repo.ts
 *
 * WHY:
 * - DAL for the recovery_token_consumptions table.
 * - The primary key on token_id_hash is the uniqueness guard that makes
 *   single-use linearizable: INSERT ... ON CONFLICT DO NOTHING RETURNING
 *   yields a row for exactly one of any number of racing inserts.
 *
 * RULES:
 * - No transactions started here (caller owns tx).
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class RecoveryConsumptionRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Returns true when this call inserted the row, false when it already existed.
   */
  async insertIfAbsent(params: {
    tokenIdHash: string;
    credentialId: string;
    expiresAt: Date;
  }): Promise<boolean> {
    const row = await this.db
      .insertInto('recovery_token_consumptions')
      .values({
        token_id_hash: params.tokenIdHash,
        credential_id: params.credentialId,
        expires_at: params.expiresAt,
      })
      .onConflict((oc) => oc.column('token_id_hash').doNothing())
      .returning('token_id_hash')
      .executeTakeFirst();

    return row !== undefined;
  }

  async deleteExpiredBefore(before: Date): Promise<number> {
    const result = await this.db
      .deleteFrom('recovery_token_consumptions')
      .where('expires_at', '<', before)
      .executeTakeFirst();

    return Number(result.numDeletedRows);
  }
}
