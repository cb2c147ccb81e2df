/**
 * backend/src/modules/auth/recovery/recovery-token-manager.ts
 *
 * WHY:
 * - Mints, verifies and burns single-use password-recovery tokens.
 * - Tokens are signed (same signer as session tokens) and carry
 *   `purpose: "password-reset"` plus a random nonce (`jti`). Nothing is
 *   stored at issue time; the nonce hash is recorded at consume time.
 *
 * LIFECYCLE:
 * - issued → consumed (first successful consume) | expired. Both terminal.
 *
 * RULES:
 * - consume() checks signature, purpose and expiry BEFORE touching the
 *   consumption record; an invalid token never writes anything.
 * - issueFor() signs a throw-away token when there is nothing to issue, so
 *   the no-account path costs the same signature as the real one.
 * - Results are discriminated unions; the service maps them to public errors.
 */

import type { TokenSigner } from '../../../shared/security/token-signer';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import { generateSecureToken } from '../../../shared/security/token';
import type { Clock } from '../../../shared/time/clock';
import type { CredentialStore } from '../../credentials';
import { RECOVERY_NONCE_BYTES, TOKEN_PURPOSES } from '../auth.constants';
import { parseRecoveryClaims, type RecoveryClaims } from '../auth.schemas';
import type { RecoveryConsumeResult, RecoveryIssueResult } from '../auth.types';
import type { RecoveryConsumptionStore } from './recovery-consumption-store';

// Fixed non-existent subject for throw-away tokens.
const DECOY_SUBJECT_ID = '00000000-0000-0000-0000-000000000000';

export class RecoveryTokenManager {
  constructor(
    private readonly deps: {
      signer: TokenSigner;
      credentialStore: CredentialStore;
      consumptionStore: RecoveryConsumptionStore;
      tokenHasher: TokenHasher;
      lifetimeSeconds: number;
      clock: Clock;
    },
  ) {}

  async issueFor(email: string): Promise<RecoveryIssueResult> {
    const credential = await this.deps.credentialStore.findByEmail(email);

    if (!credential || !credential.isActive) {
      this.sign(DECOY_SUBJECT_ID);
      return { ok: false, reason: credential ? 'inactive' : 'not_found' };
    }

    const signed = this.sign(credential.id);

    return {
      ok: true,
      token: signed.token,
      subjectId: credential.id,
      expiresAt: signed.expiresAt,
    };
  }

  async consume(token: string): Promise<RecoveryConsumeResult> {
    const verified = this.deps.signer.verify(token, this.deps.clock());
    if (!verified.ok) {
      return { ok: false, reason: verified.reason };
    }

    const claims: RecoveryClaims | null = parseRecoveryClaims(verified.claims);
    if (!claims) {
      return { ok: false, reason: 'malformed' };
    }

    const firstUse = await this.deps.consumptionStore.markConsumed({
      tokenIdHash: this.deps.tokenHasher.hash(claims.jti),
      subjectId: claims.sub,
      expiresAt: new Date(claims.exp * 1000),
    });

    if (!firstUse) {
      return { ok: false, reason: 'already_used' };
    }

    return { ok: true, subjectId: claims.sub };
  }

  private sign(subjectId: string) {
    return this.deps.signer.sign(
      {
        sub: subjectId,
        purpose: TOKEN_PURPOSES.passwordReset,
        jti: generateSecureToken(RECOVERY_NONCE_BYTES),
      },
      { issuedAt: this.deps.clock(), ttlSeconds: this.deps.lifetimeSeconds },
    );
  }
}
