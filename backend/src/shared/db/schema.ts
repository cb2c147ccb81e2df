/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a compile-time description of the tables this core touches.
 * - Kept next to the migrations: any column change in migrations/ must be
 *   mirrored here in the same commit.
 *
 * RULES:
 * - snake_case column names (DB naming), never leaked outside DAL/queries.
 * - Only the credential fields and the recovery-token consumption record live
 *   here; domain tables belong to the surrounding application.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface CredentialsTable {
  id: Generated<string>;
  email: string;
  password_hash: string;
  is_active: Generated<boolean>;
  is_superuser: Generated<boolean>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

/**
 * One row per consumed recovery token.
 * token_id_hash is the PRIMARY KEY: the uniqueness constraint IS the
 * single-use guarantee (INSERT ... ON CONFLICT DO NOTHING).
 */
export interface RecoveryTokenConsumptionsTable {
  token_id_hash: string;
  credential_id: string;
  expires_at: Timestamp;
  consumed_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface DB {
  credentials: CredentialsTable;
  recovery_token_consumptions: RecoveryTokenConsumptionsTable;
}
