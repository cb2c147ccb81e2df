/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive for the externally visible error kinds.
 * - Keeps API error responses consistent.
 * - The HTTP status is NOT part of the error: error-handler.ts owns the
 *   code -> status mapping so the core stays transport-agnostic.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 * - Transient infrastructure failures are NOT AppErrors (see StoreUnavailableError).
 */

export const APP_ERROR_CODES = [
  'AUTHENTICATION_FAILED',
  'INVALID_OR_EXPIRED_TOKEN',
  'WEAK_PASSWORD',
  'VALIDATION_ERROR',
  'CONFLICT',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static authenticationFailed(message = 'Authentication failed', meta?: AppErrorMeta) {
    return new AppError({ code: 'AUTHENTICATION_FAILED', message, meta });
  }

  static invalidOrExpiredToken(message = 'Invalid or expired token', meta?: AppErrorMeta) {
    return new AppError({ code: 'INVALID_OR_EXPIRED_TOKEN', message, meta });
  }

  static weakPassword(message = 'Password does not meet the policy', meta?: AppErrorMeta) {
    return new AppError({ code: 'WEAK_PASSWORD', message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', message, meta });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', message, meta });
  }
}
