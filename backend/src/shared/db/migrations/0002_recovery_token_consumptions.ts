/**
 * src/shared/db/migrations/0002_recovery_token_consumptions.ts
 *
 * WHY:
 * - Recovery tokens are stateless until they are used. The first successful
 *   use inserts a row keyed by sha256(jti); the primary key makes a second
 *   insert for the same token impossible, even under concurrent requests.
 * - expires_at lets a maintenance job purge rows that can no longer matter
 *   (an expired token fails verification before the table is consulted).
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('recovery_token_consumptions')
    .addColumn('token_id_hash', 'text', (col) => col.primaryKey())
    // No FK: the row must outlive (and not depend on) the credential it names.
    .addColumn('credential_id', 'uuid', (col) => col.notNull())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('consumed_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('recovery_token_consumptions_expires_at_idx')
    .on('recovery_token_consumptions')
    .column('expires_at')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('recovery_token_consumptions').ifExists().execute();
}
