/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema (kept in sync with ./migrations).
 *
 * TIMEOUTS:
 * - Every store access must be bounded. The pool enforces connection and
 *   statement timeouts server-side; withStoreTimeout() (store-errors.ts)
 *   bounds the call client-side and maps failures to StoreUnavailableError.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string, opts: { timeoutMs: number }): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: opts.timeoutMs,
    statement_timeout: opts.timeoutMs,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
