import { describe, it, expect } from "vitest";
import { computeBackoffCap, computeBackoffDelay } from "./backoff.js";

const policy = { baseDelayMs: 200, maxDelayMs: 5_000 };

describe("backoff", () => {
  it("doubles the cap per attempt from the base delay", () => {
    expect([1, 2, 3, 4, 5].map((n) => computeBackoffCap(n, policy))).toEqual([
      200, 400, 800, 1_600, 3_200,
    ]);
  });

  it("never exceeds the maximum delay", () => {
    expect(computeBackoffCap(6, policy)).toBe(5_000);
    expect(computeBackoffCap(50, policy)).toBe(5_000);
  });

  it("keeps every jittered delay within [0, cap]", () => {
    for (let attempt = 1; attempt <= 10; attempt++) {
      const cap = computeBackoffCap(attempt, policy);
      for (const r of [0, 0.25, 0.5, 0.999, 1]) {
        const delay = computeBackoffDelay(attempt, policy, () => r);
        expect(delay).toBeGreaterThanOrEqual(0);
        expect(delay).toBeLessThanOrEqual(cap);
      }
    }
  });

  it("spreads delays across the whole range (full jitter)", () => {
    expect(computeBackoffDelay(3, policy, () => 0)).toBe(0);
    expect(computeBackoffDelay(3, policy, () => 0.5)).toBe(400);
    expect(computeBackoffDelay(3, policy, () => 1)).toBe(800);
  });

  it("clamps out-of-range random sources", () => {
    expect(computeBackoffDelay(1, policy, () => -3)).toBe(0);
    expect(computeBackoffDelay(1, policy, () => 7)).toBe(200);
  });
});
