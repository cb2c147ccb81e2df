/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const TOKEN_PURPOSES = {
  session: 'session',
  passwordReset: 'password-reset',
} as const;

export const AUTH_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  forgotPassword: {
    perEmail: { limit: 3, windowSeconds: 3600 }, // silent
  },
  resetPassword: {
    perIp: { limit: 5, windowSeconds: 900 }, // hard 429
  },
} as const;

// Size of the recovery token nonce (jti), before base64url encoding.
export const RECOVERY_NONCE_BYTES = 32;
