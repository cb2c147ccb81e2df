/**
 * backend/src/modules/credentials/credential.email.ts
 *
 * Emails are matched case-insensitively: every read and write goes through
 * normalizeEmail() so "Bob@Example.COM" and "bob@example.com" are one account.
 */

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

// PII-safe: operational logs carry the domain, never the full address.
export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
