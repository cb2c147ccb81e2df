/**
 * src/shared/time/clock.ts
 *
 * Token issuance and expiry read time through this seam so tests can move
 * the clock instead of sleeping.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
