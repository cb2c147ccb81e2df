/**
 * backend/src/modules/credentials/dal/credential.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for credentials (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Callers pass an already-normalised email.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CredentialsTable } from '../../../shared/db/schema';

export type CredentialRow = Selectable<CredentialsTable>;

export async function selectCredentialByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<CredentialRow | undefined> {
  return db.selectFrom('credentials').selectAll().where('email', '=', email).executeTakeFirst();
}

export async function selectCredentialByIdSql(
  db: DbExecutor,
  id: string,
): Promise<CredentialRow | undefined> {
  return db.selectFrom('credentials').selectAll().where('id', '=', id).executeTakeFirst();
}
