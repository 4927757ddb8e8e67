/**
 * Expiry bound for a swap invocation.
 *
 * With zero tolerance the bound is the moment the invocation was accepted,
 * so anything that settles later than that second is refused.
 */

export const computeExpirySec = (submittedAtSec: bigint, toleranceSec: bigint): bigint =>
  submittedAtSec + (toleranceSec > 0n ? toleranceSec : 0n);

/** Deadlines are inclusive: a swap is still valid in its expiry second. */
export const isExpired = (expirySec: bigint, nowSec: bigint): boolean => nowSec > expirySec;
