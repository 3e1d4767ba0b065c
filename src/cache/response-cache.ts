import type { DeliveryResult } from "../types/request.js";

/**
 * A cached successful delivery
 */
export interface CacheEntry {
  readonly result: DeliveryResult;
  readonly providerUsed: string;
  readonly storedAt: number;
  readonly ttlMs: number;
}

export interface ResponseCacheConfig {
  /** Default entry lifetime in milliseconds */
  ttlMs: number;
  /** Maximum entries; least recently used are evicted beyond it */
  capacity: number;
}

/**
 * Short-lived memo of successful deliveries, keyed by fingerprint.
 *
 * Absorbs duplicate submissions of the same event; it is not a long-lived
 * store. Only successes are ever put here.
 */
export interface ResponseCache {
  get(fingerprint: string, now?: number): CacheEntry | null;
  put(
    fingerprint: string,
    result: DeliveryResult,
    ttlMs?: number,
    now?: number
  ): void;
  clear(): number;
  size(): number;
}

const isExpired = (entry: CacheEntry, now: number): boolean =>
  now - entry.storedAt >= entry.ttlMs;

/**
 * Create an LRU cache with per-entry TTL.
 *
 * Recency lives in the Map's insertion order: a hit re-inserts the entry
 * at the end, eviction removes from the front.
 */
export const createResponseCache = (
  config: ResponseCacheConfig
): ResponseCache => {
  const entries = new Map<string, CacheEntry>();

  const get = (fingerprint: string, now: number = Date.now()): CacheEntry | null => {
    const entry = entries.get(fingerprint);
    if (!entry) {
      return null;
    }
    if (isExpired(entry, now)) {
      entries.delete(fingerprint);
      return null;
    }
    entries.delete(fingerprint);
    entries.set(fingerprint, entry);
    return entry;
  };

  const evict = (now: number): void => {
    for (const [key, entry] of entries) {
      if (isExpired(entry, now)) {
        entries.delete(key);
      }
    }
    while (entries.size > config.capacity) {
      const oldest = entries.keys().next();
      if (oldest.done) {
        break;
      }
      entries.delete(oldest.value);
    }
  };

  const put = (
    fingerprint: string,
    result: DeliveryResult,
    ttlMs: number = config.ttlMs,
    now: number = Date.now()
  ): void => {
    if (ttlMs <= 0 || config.capacity <= 0) {
      return;
    }
    entries.delete(fingerprint);
    entries.set(fingerprint, {
      result,
      providerUsed: result.providerUsed,
      storedAt: now,
      ttlMs,
    });
    if (entries.size > config.capacity) {
      evict(now);
    }
  };

  const clear = (): number => {
    const count = entries.size;
    entries.clear();
    return count;
  };

  return { get, put, clear, size: () => entries.size };
};
