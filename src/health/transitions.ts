import type { HealthConfig } from "../types/config.js";
import type {
  HealthSignal,
  HealthState,
  ProviderHealth,
} from "../types/health.js";
import type { AttemptOutcome } from "../types/outcome.js";
import { TimeoutError } from "../types/errors.js";

/**
 * A state change produced by one recorded outcome
 */
export interface Transition {
  provider: string;
  from: HealthState;
  to: HealthState;
}

/**
 * Fresh record for a provider nobody has observed yet
 */
export const createHealthRecord = (provider: string): ProviderHealth => ({
  provider,
  state: "healthy",
  consecutiveFailures: 0,
  consecutiveSuccesses: 0,
  failuresInState: 0,
  flapCount: 0,
  lastProbeAt: null,
  lastOutcomeAt: null,
  nextProbeAt: null,
  canaryClaimed: false,
  lastError: null,
});

/**
 * Cooldown before the canary of an unhealthy provider:
 * base * multiplier^(flapCount - 1), capped
 */
export const computeCooldownMs = (
  flapCount: number,
  config: Pick<HealthConfig, "cooldownBaseMs" | "cooldownMaxMs" | "cooldownMultiplier">
): number => {
  const exponent = Math.max(0, flapCount - 1);
  const raw = config.cooldownBaseMs * Math.pow(config.cooldownMultiplier, exponent);
  return Math.min(raw, config.cooldownMaxMs);
};

/**
 * How an attempt outcome counts against provider health.
 *
 * Only signs of provider unreliability are failures. Local admission
 * denials, provider 429s, the caller's own deadline, payload rejections
 * and caller defects are neutral.
 */
export const healthSignal = (outcome: AttemptOutcome): HealthSignal => {
  if (outcome.type === "success") {
    return "success";
  }
  const { error } = outcome;
  switch (error.kind) {
    case "transport":
    case "provider_server":
      return "failure";
    case "timeout":
      return error instanceof TimeoutError && error.origin === "caller"
        ? "neutral"
        : "failure";
    default:
      return "neutral";
  }
};

const enterUnhealthy = (
  record: ProviderHealth,
  config: HealthConfig,
  now: number
): void => {
  record.state = "unhealthy";
  record.flapCount += 1;
  record.failuresInState = 0;
  record.nextProbeAt = now + computeCooldownMs(record.flapCount, config);
  record.canaryClaimed = false;
};

/**
 * Apply a success. Returns the transition it caused, if any.
 *
 * An unhealthy provider only climbs to degraded on its first success, so a
 * single lucky canary or probe does not put it back into full rotation.
 */
export const applySuccess = (
  record: ProviderHealth,
  config: HealthConfig,
  now: number
): Transition | null => {
  const from = record.state;

  record.consecutiveSuccesses += 1;
  record.consecutiveFailures = 0;
  record.failuresInState = 0;
  record.lastOutcomeAt = now;
  record.lastError = null;

  if (from === "unhealthy") {
    record.state = "degraded";
    record.nextProbeAt = null;
    record.canaryClaimed = false;
    record.consecutiveSuccesses = 1;
  } else if (from === "degraded" && record.consecutiveSuccesses >= config.recoverAfter) {
    record.state = "healthy";
  }

  return record.state !== from ? { provider: record.provider, from, to: record.state } : null;
};

/**
 * Apply a failure. Returns the transition it caused, if any.
 *
 * `canary` marks the failure of the single re-admission request of an
 * unhealthy provider, which starts a new, longer cooldown.
 */
export const applyFailure = (
  record: ProviderHealth,
  config: HealthConfig,
  now: number,
  error: string | null,
  canary = false
): Transition | null => {
  const from = record.state;

  record.consecutiveFailures += 1;
  record.failuresInState += 1;
  record.consecutiveSuccesses = 0;
  record.lastOutcomeAt = now;
  record.lastError = error;

  switch (from) {
    case "healthy":
      if (record.failuresInState >= config.degradeAfter) {
        record.state = "degraded";
        record.failuresInState = 0;
      }
      break;
    case "degraded":
      if (record.failuresInState >= config.unhealthyAfter) {
        enterUnhealthy(record, config, now);
      }
      break;
    case "unhealthy":
      if (canary) {
        enterUnhealthy(record, config, now);
      }
      break;
  }

  return record.state !== from ? { provider: record.provider, from, to: record.state } : null;
};
