/**
 * backend/src/shared/security/token-signer.ts
 *
 * WHY:
 * - Session and recovery tokens are self-contained signed assertions (JWT,
 *   HS256). Both token services share this one signer so the algorithm pin,
 *   key selection and failure classification cannot drift between them.
 * - Keys are versioned: the active key signs and stamps its id in the `kid`
 *   header; previous keys stay verify-only until every token they signed has
 *   expired. Rotation = new active key + old one moved to `previous`.
 *
 * FAILURE CLASSIFICATION (verify):
 * - malformed:         not a JWT (including an unparseable payload), no `kid`,
 *                      or claims that are not a JSON object
 * - invalid_signature: unknown `kid`, wrong signature, unsigned (alg "none"),
 *                      or any algorithm other than HS256
 * - expired:           now >= exp (checked only after the signature verified)
 *
 * RULES:
 * - Secrets come from config via the constructor. Never from user input,
 *   never from a module-level singleton.
 * - No business claims here: callers own `sub`, `purpose`, `jti` and validate
 *   the returned claims against their own schema.
 */

import jwt, { type Jwt } from 'jsonwebtoken';

const ALGORITHM = 'HS256';
const MIN_SECRET_LENGTH = 32;

// jsonwebtoken reports every verification failure as JsonWebTokenError; these
// messages are the ones about the signature/algorithm rather than the shape.
const SIGNATURE_FAILURE_MESSAGES = new Set([
  'invalid signature',
  'jwt signature is required',
  'invalid algorithm',
]);

export type SigningKey = {
  id: string;
  secret: string;
};

export type TokenKeyRing = {
  active: SigningKey;
  previous: readonly SigningKey[];
};

export type TokenVerifyFailureReason = 'invalid_signature' | 'expired' | 'malformed';

export type TokenVerifyResult =
  | { ok: true; keyId: string; claims: Record<string, unknown> }
  | { ok: false; reason: TokenVerifyFailureReason; detail: string };

export type SignedToken = {
  token: string;
  issuedAt: Date;
  expiresAt: Date;
};

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function fail(reason: TokenVerifyFailureReason, detail: string): TokenVerifyResult {
  return { ok: false, reason, detail };
}

function isClaimsObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeComplete(token: string): Jwt | null {
  try {
    return jwt.decode(token, { complete: true });
  } catch {
    // jws runs JSON.parse unguarded on the payload when the header says "typ":"JWT".
    return null;
  }
}

export class TokenSigner {
  private readonly active: SigningKey;
  private readonly secretsById: ReadonlyMap<string, string>;

  constructor(ring: TokenKeyRing) {
    const all = [ring.active, ...ring.previous];
    const secretsById = new Map<string, string>();

    for (const key of all) {
      if (!key.id) {
        throw new Error('TokenSigner: key id must not be empty');
      }
      if (key.secret.length < MIN_SECRET_LENGTH) {
        throw new Error(
          `TokenSigner: secret for key "${key.id}" must be at least ${MIN_SECRET_LENGTH} characters`,
        );
      }
      if (secretsById.has(key.id)) {
        throw new Error(`TokenSigner: duplicate key id "${key.id}"`);
      }
      secretsById.set(key.id, key.secret);
    }

    this.active = ring.active;
    this.secretsById = secretsById;
  }

  get activeKeyId(): string {
    return this.active.id;
  }

  /**
   * Signs `claims` with the active key.
   * `iat`/`exp` are whole seconds; the returned dates are the exact values
   * embedded in the token.
   */
  sign(
    claims: Record<string, unknown>,
    opts: { issuedAt: Date; ttlSeconds: number },
  ): SignedToken {
    if (!Number.isInteger(opts.ttlSeconds) || opts.ttlSeconds <= 0) {
      throw new Error('TokenSigner: ttlSeconds must be a positive integer');
    }

    const iat = toEpochSeconds(opts.issuedAt);
    const exp = iat + opts.ttlSeconds;

    const token = jwt.sign({ ...claims, iat, exp }, this.active.secret, {
      algorithm: ALGORITHM,
      keyid: this.active.id,
    });

    return {
      token,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  verify(token: string, now: Date): TokenVerifyResult {
    const decoded = decodeComplete(token);
    if (!decoded || typeof decoded.payload === 'string') {
      return fail('malformed', 'undecodable');
    }
    if (!isClaimsObject(decoded.payload)) {
      return fail('malformed', 'non_object_claims');
    }

    const keyId = decoded.header.kid;
    if (!keyId) {
      return fail('malformed', 'missing_key_id');
    }

    const secret = this.secretsById.get(keyId);
    if (!secret) {
      return fail('invalid_signature', 'unknown_key_id');
    }

    try {
      const claims = jwt.verify(token, secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: toEpochSeconds(now),
      });

      if (!isClaimsObject(claims)) {
        return fail('malformed', 'non_object_claims');
      }

      return { ok: true, keyId, claims };
    } catch (err) {
      // Order matters: TokenExpiredError and NotBeforeError extend JsonWebTokenError.
      if (err instanceof jwt.TokenExpiredError) {
        return fail('expired', 'expired');
      }
      if (err instanceof jwt.NotBeforeError) {
        return fail('malformed', 'not_before');
      }
      if (err instanceof jwt.JsonWebTokenError) {
        return SIGNATURE_FAILURE_MESSAGES.has(err.message)
          ? fail('invalid_signature', err.message)
          : fail('malformed', err.message);
      }
      throw err;
    }
  }
}
