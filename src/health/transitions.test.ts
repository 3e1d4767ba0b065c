import { describe, it, expect } from "vitest";
import {
  applyFailure,
  applySuccess,
  computeCooldownMs,
  createHealthRecord,
  healthSignal,
} from "./transitions.js";
import { DEFAULT_CONFIG, type HealthConfig } from "../types/config.js";
import {
  InvalidRequestError,
  ProviderRejectedError,
  ProviderServerError,
  RateLimitedError,
  TimeoutError,
  TransportError,
} from "../types/errors.js";

const config: HealthConfig = { ...DEFAULT_CONFIG.health };

const fail = (times: number, record = createHealthRecord("duix"), now = 0) => {
  for (let i = 0; i < times; i++) {
    applyFailure(record, config, now, "boom");
  }
  return record;
};

describe("health transitions", () => {
  // ─────────────────────────────────────────────────────────────────
  // Failures
  // ─────────────────────────────────────────────────────────────────

  describe("failures", () => {
    it("stays healthy below the degrade threshold", () => {
      const record = fail(2);

      expect(record.state).toBe("healthy");
      expect(record.consecutiveFailures).toBe(2);
    });

    it("degrades after K consecutive failures", () => {
      const record = fail(2);

      const transition = applyFailure(record, config, 0, "boom");

      expect(transition).toEqual({ provider: "duix", from: "healthy", to: "degraded" });
      expect(record.consecutiveFailures).toBe(3);
    });

    it("becomes unhealthy after M more failures and starts a cooldown", () => {
      const record = fail(4, createHealthRecord("duix"), 1_000);

      const transition = applyFailure(record, config, 1_000, "boom");

      expect(transition?.to).toBe("unhealthy");
      expect(record.flapCount).toBe(1);
      expect(record.nextProbeAt).toBe(1_000 + config.cooldownBaseMs);
    });

    it("stays unhealthy on ordinary failures without extending the cooldown", () => {
      const record = fail(5, createHealthRecord("duix"), 0);
      const cooldownEnd = record.nextProbeAt;

      applyFailure(record, config, 500, "still down");

      expect(record.state).toBe("unhealthy");
      expect(record.nextProbeAt).toBe(cooldownEnd);
      expect(record.flapCount).toBe(1);
    });

    it("starts a longer cooldown when the canary fails", () => {
      const record = fail(5, createHealthRecord("duix"), 0);
      record.canaryClaimed = true;

      applyFailure(record, config, 20_000, "canary failed", true);

      expect(record.state).toBe("unhealthy");
      expect(record.flapCount).toBe(2);
      expect(record.nextProbeAt).toBe(20_000 + 2 * config.cooldownBaseMs);
      expect(record.canaryClaimed).toBe(false);
    });

    it("records the last error message", () => {
      const record = createHealthRecord("duix");
      applyFailure(record, config, 42, "connection reset");

      expect(record.lastError).toBe("connection reset");
      expect(record.lastOutcomeAt).toBe(42);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Successes
  // ─────────────────────────────────────────────────────────────────

  describe("successes", () => {
    it("resets the failure counter of a healthy provider", () => {
      const record = fail(2);

      applySuccess(record, config, 0);

      expect(record.state).toBe("healthy");
      expect(record.consecutiveFailures).toBe(0);
      expect(record.consecutiveSuccesses).toBe(1);
    });

    it("recovers a degraded provider after N consecutive successes", () => {
      const record = fail(3);

      expect(applySuccess(record, config, 0)).toBeNull();
      expect(applySuccess(record, config, 0)).toEqual({
        provider: "duix",
        from: "degraded",
        to: "healthy",
      });
    });

    it("moves an unhealthy provider only to degraded on its first success", () => {
      const record = fail(5);

      const transition = applySuccess(record, config, 0);

      expect(transition?.to).toBe("degraded");
      expect(record.nextProbeAt).toBeNull();
      expect(record.consecutiveSuccesses).toBe(1);
    });

    it("returns to healthy after one more success following the canary", () => {
      const record = fail(5);
      applySuccess(record, config, 0);

      applySuccess(record, config, 0);

      expect(record.state).toBe("healthy");
    });

    it("needs M fresh failures to fall from canary-degraded back to unhealthy", () => {
      const record = fail(5);
      applySuccess(record, config, 0);

      applyFailure(record, config, 0, "boom");
      expect(record.state).toBe("degraded");
      applyFailure(record, config, 0, "boom");
      expect(record.state).toBe("unhealthy");
      expect(record.flapCount).toBe(2);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Cooldown
  // ─────────────────────────────────────────────────────────────────

  describe("computeCooldownMs", () => {
    it("grows exponentially with the flap count", () => {
      expect(computeCooldownMs(1, config)).toBe(10_000);
      expect(computeCooldownMs(2, config)).toBe(20_000);
      expect(computeCooldownMs(3, config)).toBe(40_000);
    });

    it("is capped", () => {
      expect(computeCooldownMs(20, config)).toBe(config.cooldownMaxMs);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Outcome classification
  // ─────────────────────────────────────────────────────────────────

  describe("healthSignal", () => {
    it("counts provider unreliability as failure", () => {
      expect(
        healthSignal({ type: "retryable", error: new ProviderServerError("a", 503) })
      ).toBe("failure");
      expect(
        healthSignal({ type: "retryable", error: new TransportError("a", "reset") })
      ).toBe("failure");
      expect(
        healthSignal({ type: "retryable", error: new TimeoutError("provider", "a", 100) })
      ).toBe("failure");
    });

    it("does not charge the provider for local or caller-side problems", () => {
      expect(
        healthSignal({ type: "retryable", error: new TimeoutError("caller") })
      ).toBe("neutral");
      expect(
        healthSignal({ type: "retryable", error: new RateLimitedError(["a"], "local") })
      ).toBe("neutral");
      expect(
        healthSignal({ type: "fatal", error: new InvalidRequestError(["empty text"]) })
      ).toBe("neutral");
      expect(
        healthSignal({
          type: "fatal",
          error: new ProviderRejectedError("a", 422, "too long"),
        })
      ).toBe("neutral");
    });

    it("counts success as success", () => {
      expect(
        healthSignal({
          type: "success",
          response: { status: 200, body: null, fields: {} },
        })
      ).toBe("success");
    });
  });
});
