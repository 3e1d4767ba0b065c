import { describe, it, expect } from "vitest";
import { createBucket, refill, take, retune, msUntilToken } from "./bucket.js";

describe("token bucket", () => {
  it("starts full", () => {
    const bucket = createBucket({ capacity: 3, refillPerSecond: 1 }, 0);

    expect(bucket.tokens).toBe(3);
    expect(bucket.lastRefill).toBe(0);
  });

  it("takes one token per grant and denies when empty", () => {
    const bucket = createBucket({ capacity: 2, refillPerSecond: 1 }, 0);

    expect(take(bucket, 0)).toBe(true);
    expect(take(bucket, 0)).toBe(true);
    expect(take(bucket, 0)).toBe(false);
    expect(bucket.tokens).toBe(0);
  });

  it("never goes negative under repeated denials", () => {
    const bucket = createBucket({ capacity: 1, refillPerSecond: 0 }, 0);

    take(bucket, 0);
    for (let i = 0; i < 10; i++) {
      expect(take(bucket, 0)).toBe(false);
    }
    expect(bucket.tokens).toBe(0);
  });

  it("refills continuously from elapsed time", () => {
    const bucket = createBucket({ capacity: 4, refillPerSecond: 2 }, 0);
    bucket.tokens = 0;

    refill(bucket, 500);

    expect(bucket.tokens).toBe(1);
    expect(bucket.lastRefill).toBe(500);
  });

  it("caps refill at capacity", () => {
    const bucket = createBucket({ capacity: 4, refillPerSecond: 2 }, 0);
    bucket.tokens = 1;

    refill(bucket, 60_000);

    expect(bucket.tokens).toBe(4);
  });

  it("earns nothing when the clock goes backwards", () => {
    const bucket = createBucket({ capacity: 4, refillPerSecond: 2 }, 1_000);
    bucket.tokens = 1;

    refill(bucket, 0);

    expect(bucket.tokens).toBe(1);
    expect(bucket.lastRefill).toBe(1_000);
  });

  it("denies while blocked and resumes after the block", () => {
    const bucket = createBucket({ capacity: 2, refillPerSecond: 1 }, 0);
    bucket.blockedUntil = 1_000;

    expect(take(bucket, 999)).toBe(false);
    expect(take(bucket, 1_000)).toBe(true);
    expect(bucket.blockedUntil).toBeNull();
  });

  describe("retune", () => {
    it("clamps tokens to a smaller capacity", () => {
      const bucket = createBucket({ capacity: 10, refillPerSecond: 1 }, 0);

      retune(bucket, { capacity: 3, refillPerSecond: 5 }, 0);

      expect(bucket.capacity).toBe(3);
      expect(bucket.refillPerSecond).toBe(5);
      expect(bucket.tokens).toBe(3);
    });

    it("keeps the level when capacity grows", () => {
      const bucket = createBucket({ capacity: 2, refillPerSecond: 1 }, 0);
      take(bucket, 0);

      retune(bucket, { capacity: 10, refillPerSecond: 1 }, 0);

      expect(bucket.tokens).toBe(1);
    });
  });

  describe("msUntilToken", () => {
    it("is zero when a token is available", () => {
      const bucket = createBucket({ capacity: 1, refillPerSecond: 1 }, 0);

      expect(msUntilToken(bucket, 0)).toBe(0);
    });

    it("computes the wait for the next token", () => {
      const bucket = createBucket({ capacity: 1, refillPerSecond: 4 }, 0);
      take(bucket, 0);

      expect(msUntilToken(bucket, 0)).toBe(250);
    });

    it("is infinite for a bucket that never refills", () => {
      const bucket = createBucket({ capacity: 1, refillPerSecond: 0 }, 0);
      take(bucket, 0);

      expect(msUntilToken(bucket, 0)).toBe(Number.POSITIVE_INFINITY);
    });
  });
});
