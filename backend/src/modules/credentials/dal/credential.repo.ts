/**
 * backend/src/modules/credentials/dal/credential.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for credentials (mutations).
 * - Email uniqueness is enforced by the DB unique constraint.
 *
 * RULES:
 * - No transactions started here (caller owns tx).
 * - No AppError.
 * - No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { CredentialRow } from './credential.query-sql';

export class CredentialRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Inserts a credential. Throws the driver's unique-violation error when the
   * email exists; PgCredentialStore turns that into `undefined`.
   */
  async insertCredential(params: {
    email: string;
    passwordHash: string;
    isActive: boolean;
    isSuperuser: boolean;
  }): Promise<CredentialRow> {
    return this.db
      .insertInto('credentials')
      .values({
        email: params.email,
        password_hash: params.passwordHash,
        is_active: params.isActive,
        is_superuser: params.isSuperuser,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Overwrites the password hash. Returns the number of rows touched (0 or 1).
   */
  async updatePasswordHash(params: { id: string; passwordHash: string }): Promise<number> {
    const result = await this.db
      .updateTable('credentials')
      .set({
        password_hash: params.passwordHash,
        updated_at: new Date(),
      })
      .where('id', '=', params.id)
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }
}
