import type { ProviderDescriptor } from "../types/provider.js";
import {
  type TokenBucket,
  createBucket,
  refill,
  take,
  retune,
  msUntilToken,
} from "./bucket.js";

/**
 * Default block after a provider 429 without Retry-After
 */
const DEFAULT_PENALTY_MS = 60_000;

/**
 * Bucket level reported by `levels()`
 */
export interface BucketLevel {
  provider: string;
  tokens: number;
  capacity: number;
  blockedUntil: Date | null;
}

/**
 * Per-provider admission control
 */
export interface RateLimiter {
  /**
   * Take one token for the provider. Never waits: a denial means "try the
   * next candidate". Providers without a rate limit are always granted.
   */
  tryAcquire(provider: string, now?: number): boolean;

  /**
   * Block a provider after it answered 429
   */
  penalize(provider: string, until?: Date, now?: number): void;

  /**
   * Milliseconds until the provider can admit again
   */
  msUntilAvailable(provider: string, now?: number): number;

  /**
   * Match buckets to a new provider list: survivors keep their level,
   * new providers start full, removed ones are dropped
   */
  reconcile(descriptors: readonly ProviderDescriptor[], now?: number): void;

  /**
   * Current bucket levels, for stats
   */
  levels(now?: number): BucketLevel[];
}

/**
 * Create a rate limiter over token buckets.
 *
 * Each provider has its own bucket, so admission for one provider never
 * waits on another. Every operation is synchronous; nothing is held across
 * an await.
 */
export const createRateLimiter = (
  descriptors: readonly ProviderDescriptor[] = []
): RateLimiter => {
  const buckets = new Map<string, TokenBucket>();
  /** Providers with no configured limit can still be blocked by a 429 */
  const blocks = new Map<string, number>();

  const tryAcquire = (provider: string, now: number = Date.now()): boolean => {
    const bucket = buckets.get(provider);
    if (bucket) {
      return take(bucket, now);
    }

    const blockedUntil = blocks.get(provider);
    if (blockedUntil !== undefined) {
      if (now < blockedUntil) {
        return false;
      }
      blocks.delete(provider);
    }
    return true;
  };

  const penalize = (
    provider: string,
    until?: Date,
    now: number = Date.now()
  ): void => {
    const blockedUntil = until?.getTime() ?? now + DEFAULT_PENALTY_MS;
    const bucket = buckets.get(provider);
    if (bucket) {
      bucket.blockedUntil = Math.max(bucket.blockedUntil ?? 0, blockedUntil);
      return;
    }
    blocks.set(provider, Math.max(blocks.get(provider) ?? 0, blockedUntil));
  };

  const msUntilAvailable = (provider: string, now: number = Date.now()): number => {
    const bucket = buckets.get(provider);
    if (bucket) {
      return msUntilToken(bucket, now);
    }
    const blockedUntil = blocks.get(provider);
    return blockedUntil !== undefined ? Math.max(0, blockedUntil - now) : 0;
  };

  const reconcile = (
    next: readonly ProviderDescriptor[],
    now: number = Date.now()
  ): void => {
    const names = new Set(next.map((d) => d.name));

    for (const name of [...buckets.keys()]) {
      if (!names.has(name)) {
        buckets.delete(name);
      }
    }
    for (const name of [...blocks.keys()]) {
      if (!names.has(name)) {
        blocks.delete(name);
      }
    }

    for (const descriptor of next) {
      const existing = buckets.get(descriptor.name);
      if (!descriptor.rateLimit) {
        buckets.delete(descriptor.name);
        continue;
      }
      if (existing) {
        retune(existing, descriptor.rateLimit, now);
      } else {
        buckets.set(descriptor.name, createBucket(descriptor.rateLimit, now));
      }
    }
  };

  const levels = (now: number = Date.now()): BucketLevel[] =>
    [...buckets.entries()].map(([provider, bucket]) => {
      refill(bucket, now);
      return {
        provider,
        tokens: bucket.tokens,
        capacity: bucket.capacity,
        blockedUntil:
          bucket.blockedUntil !== null ? new Date(bucket.blockedUntil) : null,
      };
    });

  reconcile(descriptors);

  return { tryAcquire, penalize, msUntilAvailable, reconcile, levels };
};
