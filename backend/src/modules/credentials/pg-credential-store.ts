/**
 * backend/src/modules/credentials/pg-credential-store.ts
 *
 * WHY:
 * - Postgres-backed CredentialStore: composes the credentials DAL/queries and
 *   enforces the store contract (normalised email, bounded time, transient
 *   failures → StoreUnavailableError).
 *
 * RULES:
 * - Every call goes through withStoreTimeout().
 * - Unique-violation on insert is an expected outcome (undefined), not an error.
 */

import type { DbExecutor } from '../../shared/db/db';
import { isUniqueViolation, withStoreTimeout } from '../../shared/db/store-errors';
import type { CredentialStore } from './credential-store';
import type { CredentialRecord, NewCredential } from './credential.types';
import { normalizeEmail } from './credential.email';
import { CredentialRepo } from './dal/credential.repo';
import {
  getCredentialByEmail,
  getCredentialById,
  toCredentialRecord,
} from './queries/credential.queries';

// ids are uuid columns; anything else cannot match and would make Postgres raise 22P02
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export class PgCredentialStore implements CredentialStore {
  private readonly repo: CredentialRepo;

  constructor(
    private readonly db: DbExecutor,
    private readonly timeoutMs: number,
  ) {
    this.repo = new CredentialRepo(db);
  }

  findByEmail(email: string): Promise<CredentialRecord | undefined> {
    return withStoreTimeout('credentials.findByEmail', this.timeoutMs, () =>
      getCredentialByEmail(this.db, normalizeEmail(email)),
    );
  }

  async findById(id: string): Promise<CredentialRecord | undefined> {
    if (!UUID_PATTERN.test(id)) return undefined;

    return withStoreTimeout('credentials.findById', this.timeoutMs, () =>
      getCredentialById(this.db, id),
    );
  }

  create(input: NewCredential): Promise<CredentialRecord | undefined> {
    return withStoreTimeout('credentials.create', this.timeoutMs, async () => {
      try {
        const row = await this.repo.insertCredential({
          ...input,
          email: normalizeEmail(input.email),
        });
        return toCredentialRecord(row);
      } catch (err) {
        if (isUniqueViolation(err)) return undefined;
        throw err;
      }
    });
  }

  async updatePasswordHash(params: { id: string; passwordHash: string }): Promise<boolean> {
    if (!UUID_PATTERN.test(params.id)) return false;

    const updated = await withStoreTimeout('credentials.updatePasswordHash', this.timeoutMs, () =>
      this.repo.updatePasswordHash(params),
    );

    return updated > 0;
  }
}
