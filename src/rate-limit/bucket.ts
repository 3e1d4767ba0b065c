import type { RateLimitPolicy } from "../types/provider.js";

/**
 * Token bucket state for one provider
 */
export interface TokenBucket {
  capacity: number;
  /** Tokens added per second */
  refillPerSecond: number;
  /** Current tokens, fractional between refills */
  tokens: number;
  /** Timestamp of the last refill */
  lastRefill: number;
  /** Provider-imposed block (429 Retry-After); no admission before this */
  blockedUntil: number | null;
}

/**
 * Create a full bucket
 */
export const createBucket = (
  policy: RateLimitPolicy,
  now: number = Date.now()
): TokenBucket => ({
  capacity: policy.capacity,
  refillPerSecond: policy.refillPerSecond,
  tokens: policy.capacity,
  lastRefill: now,
  blockedUntil: null,
});

/**
 * Add the tokens earned since the last refill.
 *
 * Refill is computed from elapsed time, so no ticking timer is needed.
 * A clock that goes backwards earns nothing.
 */
export const refill = (bucket: TokenBucket, now: number = Date.now()): void => {
  const elapsedMs = Math.max(0, now - bucket.lastRefill);
  const earned = (elapsedMs / 1000) * bucket.refillPerSecond;
  bucket.tokens = Math.min(bucket.capacity, bucket.tokens + earned);
  bucket.lastRefill = Math.max(bucket.lastRefill, now);
};

/**
 * Take one token if available. Tokens never go negative.
 */
export const take = (bucket: TokenBucket, now: number = Date.now()): boolean => {
  if (bucket.blockedUntil !== null) {
    if (now < bucket.blockedUntil) {
      return false;
    }
    bucket.blockedUntil = null;
  }

  refill(bucket, now);

  if (bucket.tokens < 1) {
    return false;
  }

  bucket.tokens -= 1;
  return true;
};

/**
 * Apply a new policy to an existing bucket, keeping its fill level
 * (clamped to the new capacity)
 */
export const retune = (
  bucket: TokenBucket,
  policy: RateLimitPolicy,
  now: number = Date.now()
): void => {
  refill(bucket, now);
  bucket.capacity = policy.capacity;
  bucket.refillPerSecond = policy.refillPerSecond;
  bucket.tokens = Math.min(bucket.tokens, policy.capacity);
};

/**
 * Milliseconds until the next token is available (0 if one is available now)
 */
export const msUntilToken = (
  bucket: TokenBucket,
  now: number = Date.now()
): number => {
  refill(bucket, now);
  const blockedMs =
    bucket.blockedUntil !== null ? Math.max(0, bucket.blockedUntil - now) : 0;
  if (bucket.tokens >= 1) {
    return blockedMs;
  }
  if (bucket.refillPerSecond <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  const refillMs = Math.ceil(((1 - bucket.tokens) / bucket.refillPerSecond) * 1000);
  return Math.max(blockedMs, refillMs);
};
