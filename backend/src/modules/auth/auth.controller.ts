/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService call for all auth endpoints.
 * - Returns structured responses; the error handler owns status mapping
 *   for failures.
 *
 * RULES:
 * - No store access here.
 * - No business rules here.
 * - Forgot/reset return fixed messages so responses never vary by account.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import {
  loginSchema,
  forgotPasswordSchema,
  resetPasswordSchema,
  changePasswordSchema,
  type LoginInput,
  type ForgotPasswordInput,
  type ResetPasswordInput,
  type ChangePasswordInput,
} from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import { requireSubject } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';

const FORGOT_PASSWORD_RESPONSE = {
  message: 'If an account with that email exists, a password reset link has been sent.',
} as const;

const RESET_PASSWORD_RESPONSE = {
  message: 'Password updated successfully. Please sign in with your new password.',
} as const;

const CHANGE_PASSWORD_RESPONSE = {
  message: 'Password updated successfully.',
} as const;

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
  }
  return parsed.data;
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body: LoginInput = parseBody(loginSchema, req.body);

    const session = await this.authService.login({
      email: body.email,
      password: body.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({
      accessToken: session.token,
      tokenType: 'bearer',
      expiresAt: session.expiresAt.toISOString(),
    });
  }

  async session(req: FastifyRequest, reply: FastifyReply) {
    const subjectId = requireSubject(req);
    return reply.status(200).send({ subjectId });
  }

  async forgotPassword(req: FastifyRequest, reply: FastifyReply) {
    const body: ForgotPasswordInput = parseBody(forgotPasswordSchema, req.body);

    await this.authService.requestPasswordReset({
      email: body.email,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(FORGOT_PASSWORD_RESPONSE);
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const body: ResetPasswordInput = parseBody(resetPasswordSchema, req.body);

    await this.authService.resetPassword({
      token: body.token,
      newPassword: body.newPassword,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(RESET_PASSWORD_RESPONSE);
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const subjectId = requireSubject(req);

    const body: ChangePasswordInput = parseBody(changePasswordSchema, req.body);

    await this.authService.changePassword({
      subjectId,
      currentPassword: body.currentPassword,
      newPassword: body.newPassword,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(CHANGE_PASSWORD_RESPONSE);
  }
}
