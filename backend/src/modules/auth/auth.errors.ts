/**
 * backend/src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns the public wording of its errors.
 * - Security-safe: messages never reveal whether an email exists, whether an
 *   account is disabled, or which token check failed.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /**
   * Login and bearer-token failures. One message for unknown email, wrong
   * password, disabled account, and every session-token failure.
   */
  authenticationFailed(meta?: AppErrorMeta) {
    return AppError.authenticationFailed('Invalid email or password.', meta);
  },

  /** Bearer token missing or rejected on a protected route. */
  notAuthenticated(meta?: AppErrorMeta) {
    return AppError.authenticationFailed('Authentication required.', meta);
  },

  /**
   * Recovery token is invalid, expired, already used, or points at an account
   * that can no longer be reset. A single error covers all of them.
   */
  resetTokenInvalid(meta?: AppErrorMeta) {
    return AppError.invalidOrExpiredToken(
      'This password reset link is invalid or has expired. Please request a new one.',
      meta,
    );
  },

  weakPassword(message: string, meta?: AppErrorMeta) {
    return AppError.weakPassword(message, meta);
  },

  /** Change-password: the current password did not verify. */
  incorrectPassword(meta?: AppErrorMeta) {
    return AppError.validationError('Incorrect password.', meta);
  },

  /** Change-password: new password equals the current one. */
  samePassword(meta?: AppErrorMeta) {
    return AppError.validationError('New password cannot be the same as the current one.', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('A credential with this email already exists.', meta);
  },
} as const;
