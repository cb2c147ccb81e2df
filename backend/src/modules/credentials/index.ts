/**
 * backend/src/modules/credentials/index.ts
 *
 * WHY:
 * - Public surface of the credentials module.
 * - Prevents cross-module coupling via deep imports into /queries or /dal.
 */

export type { CredentialStore } from './credential-store';
export type {
  CredentialId,
  CredentialRecord,
  CredentialSummary,
  NewCredential,
} from './credential.types';
export { toCredentialSummary } from './credential.types';
export { normalizeEmail, emailDomain } from './credential.email';
export { InMemCredentialStore } from './inmem-credential-store';
