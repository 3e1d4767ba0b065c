/**
 * Rate Limit Module
 *
 * Per-provider token buckets used for admission control, plus blocking
 * after provider 429 responses.
 */

export {
  createRateLimiter,
  type RateLimiter,
  type BucketLevel,
} from "./limiter.js";

export {
  type TokenBucket,
  createBucket,
  refill,
  take,
  retune,
  msUntilToken,
} from "./bucket.js";
