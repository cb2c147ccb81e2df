/**
 * backend/src/modules/auth/tokens/session-token-issuer.ts
 *
 * WHY:
 * - Mints and checks the stateless bearer token returned by login.
 * - Validity is a pure function of signature, purpose and clock: nothing is
 *   stored, so issue/validate run in parallel without coordination.
 *
 * RULES:
 * - validate() never throws for a bad token; it returns a reason.
 * - A token signed for another purpose (e.g. a recovery token) is malformed here.
 * - Re-login is the only renewal path (no refresh).
 */

import type { TokenSigner } from '../../../shared/security/token-signer';
import type { Clock } from '../../../shared/time/clock';
import { TOKEN_PURPOSES } from '../auth.constants';
import { parseSessionClaims, type SessionClaims } from '../auth.schemas';
import type { SessionToken, SessionValidationResult } from '../auth.types';

export class SessionTokenIssuer {
  constructor(
    private readonly deps: {
      signer: TokenSigner;
      lifetimeSeconds: number;
      clock: Clock;
    },
  ) {}

  get lifetimeSeconds(): number {
    return this.deps.lifetimeSeconds;
  }

  issue(subjectId: string): SessionToken {
    const signed = this.deps.signer.sign(
      { sub: subjectId, purpose: TOKEN_PURPOSES.session },
      { issuedAt: this.deps.clock(), ttlSeconds: this.deps.lifetimeSeconds },
    );

    return {
      token: signed.token,
      subjectId,
      issuedAt: signed.issuedAt,
      expiresAt: signed.expiresAt,
    };
  }

  validate(token: string): SessionValidationResult {
    const verified = this.deps.signer.verify(token, this.deps.clock());
    if (!verified.ok) {
      return { ok: false, reason: verified.reason };
    }

    const claims: SessionClaims | null = parseSessionClaims(verified.claims);
    if (!claims) {
      return { ok: false, reason: 'malformed' };
    }

    return { ok: true, subjectId: claims.sub };
  }
}
