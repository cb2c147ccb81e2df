/**
 * backend/src/modules/credentials/credential-store.ts
 *
 * WHY:
 * - The Credential Store is a leaf dependency of the auth core. Services
 *   depend on this interface (DIP); Postgres and in-memory implementations
 *   are chosen in di.ts.
 *
 * CONTRACT:
 * - Emails are normalised by the store on every call.
 * - Read-your-writes: a record returned by create() or changed by
 *   updatePasswordHash() is visible to the next find*() call.
 * - create() returns undefined when the email is already taken.
 * - updatePasswordHash() returns false when no record has that id.
 * - Transient failures reject with StoreUnavailableError (retryable);
 *   no call blocks longer than the configured store timeout.
 * - Records are never deleted here.
 */

import type { CredentialId, CredentialRecord, NewCredential } from './credential.types';

export interface CredentialStore {
  findByEmail(email: string): Promise<CredentialRecord | undefined>;
  findById(id: CredentialId): Promise<CredentialRecord | undefined>;
  create(input: NewCredential): Promise<CredentialRecord | undefined>;
  updatePasswordHash(params: { id: CredentialId; passwordHash: string }): Promise<boolean>;
}
