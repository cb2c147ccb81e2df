/**
 * backend/src/modules/auth/recovery/recovery-consumption-store.ts
 *
 * WHY:
 * - Single-use enforcement for recovery tokens, isolated behind one small
 *   interface so the backing store can be swapped.
 * - Only the RecoveryTokenManager writes it.
 *
 * CONTRACT:
 * - markConsumed() is a linearizable check-and-set keyed by tokenIdHash:
 *   for any number of concurrent calls with the same key exactly one
 *   resolves true; every other (and every later) call resolves false.
 * - purgeExpired(before) drops entries whose token expired before `before`.
 *   Those tokens can no longer verify, so their entries carry no information.
 * - Transient infrastructure failures reject with StoreUnavailableError.
 */

export type ConsumptionEntry = {
  /** sha256 of the token's jti; the raw nonce is never stored. */
  tokenIdHash: string;
  subjectId: string;
  expiresAt: Date;
};

export interface RecoveryConsumptionStore {
  markConsumed(entry: ConsumptionEntry): Promise<boolean>;
  purgeExpired(before: Date): Promise<number>;
}
