/**
 * backend/src/modules/auth/flows/credentials/change-password-flow.ts
 *
 * WHY:
 * - Authenticated password update ("I know my password and want a new one").
 *
 * RULES:
 * - The caller is already authorized (subjectId comes from a valid session).
 * - Current password must verify; a disabled or vanished account is treated
 *   as unauthenticated.
 * - New password must differ from the current one and pass the policy.
 * - Outstanding session tokens stay valid until they expire (stateless).
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { CredentialStore } from '../../../credentials';

import { AuthErrors } from '../../auth.errors';
import {
  getPasswordStrengthFailure,
  type PasswordPolicy,
} from '../../policies/password-strength.policy';

export type ChangePasswordParams = {
  subjectId: string;
  currentPassword: string;
  newPassword: string;
  requestId: string;
};

export async function changePasswordFlow(
  deps: {
    credentialStore: CredentialStore;
    passwordHasher: PasswordHasher;
    logger: Logger;
    passwordPolicy: PasswordPolicy;
  },
  params: ChangePasswordParams,
): Promise<void> {
  const logBase = {
    flow: 'auth.password_change',
    requestId: params.requestId,
    subjectId: params.subjectId,
  };

  const reject = (reason: string, error: Error): Error => {
    deps.logger.info({ msg: 'auth.password_change.rejected', ...logBase, reason });
    return error;
  };

  const credential = await deps.credentialStore.findById(params.subjectId);
  if (!credential || !credential.isActive) {
    throw reject(
      credential ? 'account_disabled' : 'credential_not_found',
      AuthErrors.notAuthenticated(),
    );
  }

  const currentValid = await deps.passwordHasher.verify(
    params.currentPassword,
    credential.passwordHash,
  );
  if (!currentValid) {
    throw reject('wrong_password', AuthErrors.incorrectPassword());
  }

  if (params.newPassword === params.currentPassword) {
    throw reject('same_password', AuthErrors.samePassword());
  }

  const weak = getPasswordStrengthFailure(params.newPassword, deps.passwordPolicy);
  if (weak) {
    throw reject(weak.reason, weak.error);
  }

  const passwordHash = await deps.passwordHasher.hash(params.newPassword);
  const updated = await deps.credentialStore.updatePasswordHash({
    id: credential.id,
    passwordHash,
  });
  if (!updated) {
    throw reject('credential_not_found', AuthErrors.notAuthenticated());
  }

  deps.logger.info({ msg: 'auth.password_change.completed', ...logBase });
}
