import { describe, it, expect, vi, beforeEach } from "vitest";
import { createHealthMonitor, type HealthMonitor } from "./monitor.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import {
  ProviderServerError,
  RateLimitedError,
  TimeoutError,
} from "../types/errors.js";
import type { AttemptOutcome } from "../types/outcome.js";

const serverFailure: AttemptOutcome = {
  type: "retryable",
  error: new ProviderServerError("duix", 502),
};

const success: AttemptOutcome = {
  type: "success",
  response: { status: 200, body: {}, fields: {} },
};

describe("HealthMonitor", () => {
  let monitor: HealthMonitor;
  const onTransition = vi.fn();

  beforeEach(() => {
    onTransition.mockReset();
    monitor = createHealthMonitor({
      providers: ["duix", "akool"],
      health: { ...DEFAULT_CONFIG.health },
      onTransition,
    });
  });

  const failTimes = (provider: string, times: number, now = 0) => {
    for (let i = 0; i < times; i++) {
      monitor.recordOutcome(provider, serverFailure, now);
    }
  };

  it("starts every provider healthy", () => {
    const snapshot = monitor.snapshot();

    expect(Object.keys(snapshot).sort()).toEqual(["akool", "duix"]);
    expect(snapshot["duix"]?.state).toBe("healthy");
  });

  it("returns copies that do not change with later updates", () => {
    const before = monitor.snapshot();

    failTimes("duix", 1);

    expect(before["duix"]?.consecutiveFailures).toBe(0);
    expect(monitor.snapshot()["duix"]?.consecutiveFailures).toBe(1);
  });

  it("only touches the record of the provider it is told about", () => {
    failTimes("duix", 3);

    expect(monitor.stateOf("duix")).toBe("degraded");
    expect(monitor.stateOf("akool")).toBe("healthy");
  });

  it("reports transitions", () => {
    failTimes("duix", 3);

    expect(onTransition).toHaveBeenCalledTimes(1);
    expect(onTransition).toHaveBeenCalledWith({
      provider: "duix",
      from: "healthy",
      to: "degraded",
    });
  });

  it("keeps degraded providers selectable and excludes unhealthy ones", () => {
    failTimes("duix", 3);
    expect(monitor.isSelectable("duix")).toBe(true);

    failTimes("duix", 2);
    expect(monitor.isSelectable("duix")).toBe(false);
  });

  it("ignores neutral outcomes", () => {
    monitor.recordOutcome("duix", {
      type: "retryable",
      error: new RateLimitedError(["duix"], "provider"),
    });
    monitor.recordOutcome("duix", {
      type: "retryable",
      error: new TimeoutError("caller", "duix"),
    });

    expect(monitor.snapshot()["duix"]?.consecutiveFailures).toBe(0);
  });

  it("ignores outcomes for unknown providers", () => {
    monitor.recordOutcome("ghost", serverFailure);

    expect(monitor.snapshot()["ghost"]).toBeUndefined();
  });

  // ─────────────────────────────────────────────────────────────────
  // Canary
  // ─────────────────────────────────────────────────────────────────

  describe("canary", () => {
    beforeEach(() => {
      failTimes("duix", 5, 0);
    });

    it("is not offered before the cooldown elapses", () => {
      expect(monitor.claimCanary("duix", 9_999)).toBe(false);
    });

    it("is offered exactly once after the cooldown", () => {
      expect(monitor.claimCanary("duix", 10_000)).toBe(true);
      expect(monitor.claimCanary("duix", 10_001)).toBe(false);
    });

    it("can be claimed again after an unused claim is released", () => {
      monitor.claimCanary("duix", 10_000);
      monitor.releaseCanary("duix");

      expect(monitor.claimCanary("duix", 10_000)).toBe(true);
    });

    it("frees the slot when the canary outcome is neutral", () => {
      monitor.claimCanary("duix", 10_000);
      monitor.recordOutcome(
        "duix",
        { type: "retryable", error: new TimeoutError("caller", "duix") },
        10_050
      );

      expect(monitor.claimCanary("duix", 10_100)).toBe(true);
    });

    it("moves to degraded when the canary succeeds", () => {
      monitor.claimCanary("duix", 10_000);
      monitor.recordOutcome("duix", success, 10_100);

      expect(monitor.stateOf("duix")).toBe("degraded");
      expect(monitor.isSelectable("duix")).toBe(true);
    });

    it("restarts a doubled cooldown when the canary fails", () => {
      monitor.claimCanary("duix", 10_000);
      monitor.recordOutcome("duix", serverFailure, 10_100);

      const record = monitor.snapshot()["duix"];
      expect(record?.state).toBe("unhealthy");
      expect(record?.nextProbeAt).toBe(10_100 + 20_000);
      expect(monitor.claimCanary("duix", 10_200)).toBe(false);
    });

    it("is never offered to healthy providers", () => {
      expect(monitor.claimCanary("akool", 1_000_000)).toBe(false);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Probes
  // ─────────────────────────────────────────────────────────────────

  describe("recordProbe", () => {
    it("counts probe successes toward recovery", () => {
      failTimes("duix", 3);

      monitor.recordProbe("duix", true, undefined, 100);
      monitor.recordProbe("duix", true, undefined, 200);

      const record = monitor.snapshot()["duix"];
      expect(record?.state).toBe("healthy");
      expect(record?.lastProbeAt).toBe(200);
    });

    it("lists only degraded and unhealthy providers as probe targets", () => {
      failTimes("duix", 3);

      expect(monitor.probeTargets()).toEqual(["duix"]);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Reload
  // ─────────────────────────────────────────────────────────────────

  describe("reconcile", () => {
    it("preserves history for providers that persist across a reload", () => {
      failTimes("duix", 3);

      monitor.reconcile(["duix", "sense"]);

      const snapshot = monitor.snapshot();
      expect(snapshot["duix"]?.state).toBe("degraded");
      expect(snapshot["sense"]?.state).toBe("healthy");
      expect(snapshot["akool"]).toBeUndefined();
    });
  });
});
