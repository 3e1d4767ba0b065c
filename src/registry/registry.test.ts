import { describe, it, expect, vi, beforeEach } from "vitest";
import { createProviderRegistry, type ProviderRegistry } from "./registry.js";
import { createHealthMonitor, type HealthMonitor } from "../health/monitor.js";
import { createRateLimiter, type RateLimiter } from "../rate-limit/limiter.js";
import type { AdapterContext, AdapterFactory } from "../adapters/index.js";
import { DEFAULT_CONFIG, toDescriptor } from "../types/config.js";
import { ConfigurationError, TransportError } from "../types/errors.js";

const context: AdapterContext = { formats: new Map(), attemptTimeoutMs: 1_000 };

const fakeFactory: AdapterFactory = (descriptor) => ({
  provider: descriptor.name,
  kind: descriptor.adapter,
  speak: () => Promise.resolve({ status: 200, body: null, fields: {} }),
  probe: () => Promise.resolve(),
});

const descriptor = (name: string, capacity?: number) =>
  toDescriptor({
    name,
    adapter: "mock",
    baseUrl: `https://${name}.test`,
    rateLimit: capacity !== undefined ? { capacity, refillPerSecond: 1 } : undefined,
  });

describe("ProviderRegistry", () => {
  let monitor: HealthMonitor;
  let limiter: RateLimiter;
  let registry: ProviderRegistry;
  const createAdapter = vi.fn(fakeFactory);

  beforeEach(() => {
    createAdapter.mockClear();
    monitor = createHealthMonitor({ health: { ...DEFAULT_CONFIG.health } });
    limiter = createRateLimiter();
    registry = createProviderRegistry([descriptor("a"), descriptor("b", 2)], {
      monitor,
      limiter,
      adapterContext: context,
      createAdapter,
    });
  });

  it("builds one adapter per descriptor and registers health and buckets", () => {
    expect(registry.names()).toEqual(["a", "b"]);
    expect(registry.get("a")?.adapter.provider).toBe("a");
    expect(createAdapter).toHaveBeenCalledTimes(2);
    expect(Object.keys(monitor.snapshot()).sort()).toEqual(["a", "b"]);
    expect(limiter.levels().map((l) => l.provider)).toEqual(["b"]);
  });

  it("exposes frozen descriptors", () => {
    expect(Object.isFrozen(registry.get("a")?.descriptor)).toBe(true);
  });

  it("rejects duplicate provider names", () => {
    expect(() =>
      createProviderRegistry([descriptor("a"), descriptor("a")], {
        monitor,
        limiter,
        adapterContext: context,
        createAdapter,
      })
    ).toThrow(ConfigurationError);
  });

  it("keeps health history for providers that survive a reload", () => {
    monitor.recordOutcome("a", {
      type: "retryable",
      error: new TransportError("a", "reset"),
    });

    registry.reload([descriptor("a"), descriptor("c")]);

    expect(registry.names()).toEqual(["a", "c"]);
    const snapshot = monitor.snapshot();
    expect(snapshot["a"]?.consecutiveFailures).toBe(1);
    expect(snapshot["c"]?.consecutiveFailures).toBe(0);
    expect(snapshot["b"]).toBeUndefined();
    expect(limiter.levels()).toEqual([]);
  });

  it("leaves the current providers in place when a reload is invalid", () => {
    expect(() => registry.reload([descriptor("x"), descriptor("x")])).toThrow(
      ConfigurationError
    );

    expect(registry.names()).toEqual(["a", "b"]);
    expect(Object.keys(monitor.snapshot()).sort()).toEqual(["a", "b"]);
  });

  it("does not disturb a provider list already handed out", () => {
    const before = registry.list();

    registry.reload([descriptor("z")]);

    expect(before.map((p) => p.descriptor.name)).toEqual(["a", "b"]);
    expect(registry.list().map((p) => p.descriptor.name)).toEqual(["z"]);
  });
});
