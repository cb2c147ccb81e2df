/**
 * backend/src/modules/credentials/inmem-credential-store.ts
 *
 * WHY:
 * - Lets service and HTTP tests (and local runs) exercise the auth core
 *   without Postgres.
 * - Same contract as PgCredentialStore: normalised email, unique email,
 *   read-your-writes.
 *
 * RULES:
 * - Returns copies so callers cannot mutate stored records.
 */

import { randomUUID } from 'node:crypto';
import type { CredentialStore } from './credential-store';
import type { CredentialRecord, NewCredential } from './credential.types';
import { normalizeEmail } from './credential.email';

export class InMemCredentialStore implements CredentialStore {
  private readonly byId = new Map<string, CredentialRecord>();
  private readonly idByEmail = new Map<string, string>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  findByEmail(email: string): Promise<CredentialRecord | undefined> {
    const id = this.idByEmail.get(normalizeEmail(email));
    return Promise.resolve(id ? this.copy(id) : undefined);
  }

  findById(id: string): Promise<CredentialRecord | undefined> {
    return Promise.resolve(this.copy(id));
  }

  create(input: NewCredential): Promise<CredentialRecord | undefined> {
    const email = normalizeEmail(input.email);
    if (this.idByEmail.has(email)) return Promise.resolve(undefined);

    const now = this.now();
    const record: CredentialRecord = {
      id: randomUUID(),
      email,
      passwordHash: input.passwordHash,
      isActive: input.isActive,
      isSuperuser: input.isSuperuser,
      createdAt: now,
      updatedAt: now,
    };

    this.byId.set(record.id, record);
    this.idByEmail.set(email, record.id);

    return Promise.resolve({ ...record });
  }

  updatePasswordHash(params: { id: string; passwordHash: string }): Promise<boolean> {
    const existing = this.byId.get(params.id);
    if (!existing) return Promise.resolve(false);

    this.byId.set(params.id, {
      ...existing,
      passwordHash: params.passwordHash,
      updatedAt: this.now(),
    });

    return Promise.resolve(true);
  }

  /**
   * Test/dev helper: flips is_active (account disabling is a domain-layer
   * action outside this core).
   */
  setActive(id: string, isActive: boolean): void {
    const existing = this.byId.get(id);
    if (!existing) throw new Error(`InMemCredentialStore: no credential ${id}`);
    this.byId.set(id, { ...existing, isActive });
  }

  private copy(id: string): CredentialRecord | undefined {
    const record = this.byId.get(id);
    return record ? { ...record } : undefined;
  }
}
