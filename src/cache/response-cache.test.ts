import { describe, it, expect } from "vitest";
import { createResponseCache } from "./response-cache.js";
import type { DeliveryResult } from "../types/request.js";

const makeResult = (fingerprint: string, provider = "duix"): DeliveryResult => ({
  providerUsed: provider,
  response: { status: 200, body: { ok: true }, fields: {} },
  fingerprint,
  cached: false,
  attempts: 1,
  latencyMs: 12,
  deliveredAt: 0,
});

describe("ResponseCache", () => {
  it("returns a stored entry within its TTL", () => {
    const cache = createResponseCache({ ttlMs: 5_000, capacity: 10 });
    cache.put("f1", makeResult("f1", "sense"), undefined, 1_000);

    const entry = cache.get("f1", 3_000);

    expect(entry?.providerUsed).toBe("sense");
    expect(entry?.storedAt).toBe(1_000);
    expect(entry?.ttlMs).toBe(5_000);
  });

  it("misses once the TTL has elapsed and drops the entry", () => {
    const cache = createResponseCache({ ttlMs: 5_000, capacity: 10 });
    cache.put("f1", makeResult("f1"), undefined, 1_000);

    expect(cache.get("f1", 6_000)).toBeNull();
    expect(cache.size()).toBe(0);
  });

  it("honours a per-entry TTL", () => {
    const cache = createResponseCache({ ttlMs: 5_000, capacity: 10 });
    cache.put("f1", makeResult("f1"), 500, 0);

    expect(cache.get("f1", 499)).not.toBeNull();
    expect(cache.get("f1", 500)).toBeNull();
  });

  it("evicts the least recently used entry over capacity", () => {
    const cache = createResponseCache({ ttlMs: 60_000, capacity: 2 });
    cache.put("a", makeResult("a"), undefined, 0);
    cache.put("b", makeResult("b"), undefined, 1);

    // Touch "a" so "b" becomes the oldest
    cache.get("a", 2);
    cache.put("c", makeResult("c"), undefined, 3);

    expect(cache.size()).toBe(2);
    expect(cache.get("b", 4)).toBeNull();
    expect(cache.get("a", 4)).not.toBeNull();
    expect(cache.get("c", 4)).not.toBeNull();
  });

  it("prefers evicting expired entries before live ones", () => {
    const cache = createResponseCache({ ttlMs: 60_000, capacity: 2 });
    cache.put("live", makeResult("live"), undefined, 0);
    cache.put("short", makeResult("short"), 10, 0);
    cache.get("live", 5);

    cache.put("new", makeResult("new"), undefined, 20);

    expect(cache.get("live", 21)).not.toBeNull();
    expect(cache.get("new", 21)).not.toBeNull();
    expect(cache.size()).toBe(2);
  });

  it("replaces an entry stored under the same fingerprint", () => {
    const cache = createResponseCache({ ttlMs: 5_000, capacity: 10 });
    cache.put("f1", makeResult("f1", "duix"), undefined, 0);
    cache.put("f1", makeResult("f1", "akool"), undefined, 100);

    expect(cache.size()).toBe(1);
    expect(cache.get("f1", 200)?.providerUsed).toBe("akool");
  });

  it("stores nothing with a zero capacity", () => {
    const cache = createResponseCache({ ttlMs: 5_000, capacity: 0 });
    cache.put("f1", makeResult("f1"));

    expect(cache.size()).toBe(0);
  });

  it("clear returns the number of dropped entries", () => {
    const cache = createResponseCache({ ttlMs: 5_000, capacity: 10 });
    cache.put("a", makeResult("a"));
    cache.put("b", makeResult("b"));

    expect(cache.clear()).toBe(2);
    expect(cache.size()).toBe(0);
  });
});
