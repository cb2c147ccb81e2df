/**
 * backend/src/modules/auth/flows/credentials/create-credential-flow.ts
 *
 * WHY:
 * - The only way a credential record comes into existence: the domain layer
 *   (user admin screens, the first-superuser seed) calls it through AuthService.
 *
 * RULES:
 * - Password policy applies to every new credential.
 * - Duplicate email → CONFLICT. The store reports it as `undefined`.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import { toCredentialSummary, type CredentialStore, type CredentialSummary } from '../../../credentials';

import { AuthErrors } from '../../auth.errors';
import { emailLogFields } from '../../helpers/email-log-fields';
import {
  getPasswordStrengthFailure,
  type PasswordPolicy,
} from '../../policies/password-strength.policy';

export type CreateCredentialParams = {
  email: string;
  password: string;
  isActive?: boolean;
  isSuperuser?: boolean;
  requestId?: string;
};

export async function createCredentialFlow(
  deps: {
    credentialStore: CredentialStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    logger: Logger;
    passwordPolicy: PasswordPolicy;
  },
  params: CreateCredentialParams,
): Promise<CredentialSummary> {
  const logBase = {
    flow: 'auth.credential.create',
    requestId: params.requestId ?? null,
    ...emailLogFields(deps.tokenHasher, params.email),
  };

  const weak = getPasswordStrengthFailure(params.password, deps.passwordPolicy);
  if (weak) {
    deps.logger.info({ msg: 'auth.credential.create_rejected', ...logBase, reason: weak.reason });
    throw weak.error;
  }

  const passwordHash = await deps.passwordHasher.hash(params.password);

  const created = await deps.credentialStore.create({
    email: params.email,
    passwordHash,
    isActive: params.isActive ?? true,
    isSuperuser: params.isSuperuser ?? false,
  });

  if (!created) {
    deps.logger.info({ msg: 'auth.credential.create_rejected', ...logBase, reason: 'email_taken' });
    throw AuthErrors.emailTaken();
  }

  deps.logger.info({
    msg: 'auth.credential.created',
    ...logBase,
    subjectId: created.id,
    isSuperuser: created.isSuperuser,
  });

  return toCredentialSummary(created);
}
