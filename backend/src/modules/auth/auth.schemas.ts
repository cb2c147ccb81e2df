/**
 * backend/src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Request validation for the auth HTTP adapter.
 * - Claim validation for decoded session/recovery tokens: a verified
 *   signature only proves who wrote the payload, not that it has our shape.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password strength is NOT checked here: the policy is configuration-driven
 *   and lives in policies/password-strength.policy.ts.
 * - Email normalised in the store, not here.
 */

import { z } from 'zod';
import { TOKEN_PURPOSES } from './auth.constants';

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const forgotPasswordSchema = z.object({
  email: z.string().email('Invalid email address'),
});

export type ForgotPasswordInput = z.infer<typeof forgotPasswordSchema>;

export const resetPasswordSchema = z.object({
  // Cryptographic checks happen in the recovery token manager.
  token: z.string().min(20, 'Invalid reset token'),
  newPassword: z.string().min(1, 'New password is required'),
});

export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, 'Current password is required'),
  newPassword: z.string().min(1, 'New password is required'),
});

export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;

// ── Token claims ─────────────────────────────────────────────

export const sessionClaimsSchema = z.object({
  sub: z.string().min(1),
  purpose: z.literal(TOKEN_PURPOSES.session),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type SessionClaims = z.infer<typeof sessionClaimsSchema>;

/** Shape check plus exp > iat. null means malformed. */
export function parseSessionClaims(raw: Record<string, unknown>): SessionClaims | null {
  const parsed = sessionClaimsSchema.safeParse(raw);
  return parsed.success && parsed.data.exp > parsed.data.iat ? parsed.data : null;
}

export const recoveryClaimsSchema = z.object({
  sub: z.string().min(1),
  purpose: z.literal(TOKEN_PURPOSES.passwordReset),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type RecoveryClaims = z.infer<typeof recoveryClaimsSchema>;

export function parseRecoveryClaims(raw: Record<string, unknown>): RecoveryClaims | null {
  const parsed = recoveryClaimsSchema.safeParse(raw);
  return parsed.success && parsed.data.exp > parsed.data.iat ? parsed.data : null;
}
