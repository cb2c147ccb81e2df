/**
 * backend/src/modules/credentials/queries/credential.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into CredentialRecord domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectCredentialByEmailSql, selectCredentialByIdSql } from '../dal/credential.query-sql';
import type { CredentialRow } from '../dal/credential.query-sql';
import type { CredentialRecord } from '../credential.types';

export function toCredentialRecord(row: CredentialRow): CredentialRecord {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    isSuperuser: row.is_superuser,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getCredentialByEmail(
  db: DbExecutor,
  email: string,
): Promise<CredentialRecord | undefined> {
  const row = await selectCredentialByEmailSql(db, email);
  if (!row) return undefined;
  return toCredentialRecord(row);
}

export async function getCredentialById(
  db: DbExecutor,
  id: string,
): Promise<CredentialRecord | undefined> {
  const row = await selectCredentialByIdSql(db, id);
  if (!row) return undefined;
  return toCredentialRecord(row);
}
