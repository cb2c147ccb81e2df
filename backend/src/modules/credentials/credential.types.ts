/**
 * backend/src/modules/credentials/credential.types.ts
 *
 * WHY:
 * - Domain types for the Credential Store.
 * - A credential record is the stored login identity of one account.
 *
 * RULES:
 * - Keep aligned with DB schema (shared/db/schema.ts).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash never leaves the auth core: public shapes use CredentialSummary.
 */

export type CredentialId = string;

export type CredentialRecord = {
  id: CredentialId;
  /** Normalised: trimmed + lower-case. */
  email: string;
  /** Opaque: algorithm + salt + digest in one string. */
  passwordHash: string;
  isActive: boolean;
  isSuperuser: boolean;

  createdAt: Date;
  updatedAt: Date;
};

export type NewCredential = {
  email: string;
  passwordHash: string;
  isActive: boolean;
  isSuperuser: boolean;
};

export type CredentialSummary = Omit<CredentialRecord, 'passwordHash'>;

export function toCredentialSummary(record: CredentialRecord): CredentialSummary {
  return {
    id: record.id,
    email: record.email,
    isActive: record.isActive,
    isSuperuser: record.isSuperuser,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}
