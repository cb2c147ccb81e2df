/**
 * backend/src/modules/credentials/credential.module.ts
 *
 * WHY:
 * - Encapsulates Credentials module wiring.
 * - Support module (no routes of its own): the auth module consumes its store.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { DbExecutor } from '../../shared/db/db';
import type { CredentialStore } from './credential-store';
import { PgCredentialStore } from './pg-credential-store';

export type CredentialModule = ReturnType<typeof createCredentialModule>;

export function createCredentialModule(deps: { db: DbExecutor; storeTimeoutMs: number }) {
  const credentialStore: CredentialStore = new PgCredentialStore(deps.db, deps.storeTimeoutMs);

  return {
    credentialStore,
  };
}
