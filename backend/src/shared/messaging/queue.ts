/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - The auth service enqueues messages; the transport (SMTP relay, SES, a
 *   mail catcher in dev) is wired at the DI layer only.
 * - The authentication path never awaits delivery: response latency must not
 *   reveal whether an account exists.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - The raw recovery token is allowed here (inside the reset link). It travels
 *   to the email renderer only. It is never stored anywhere.
 * - Never put password hashes or session tokens in messages.
 */

export type ResetPasswordEmailMessage = {
  type: 'auth.reset-password-email';
  subjectId: string;
  email: string;
  /** Full reset URL including the raw recovery token as `?token=`. */
  resetLink: string;
  /** ISO timestamp; lets the renderer print "valid for N minutes". */
  expiresAt: string;
};

// Union: add new message types as the core grows.
export type QueueMessage = ResetPasswordEmailMessage;

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
