import type { HealthConfig } from "../types/config.js";
import type {
  HealthSnapshot,
  HealthState,
  ProviderHealth,
} from "../types/health.js";
import type { AttemptOutcome } from "../types/outcome.js";
import { debug } from "../utils/debug.js";
import {
  type Transition,
  applyFailure,
  applySuccess,
  createHealthRecord,
  healthSignal,
} from "./transitions.js";

/**
 * Configuration for the health monitor
 */
export interface HealthMonitorConfig {
  /** Providers to track from the start */
  providers?: readonly string[];
  /** State machine thresholds */
  health: HealthConfig;
  /** Called after every state change */
  onTransition?: (transition: Transition) => void;
}

/**
 * Tracks a rolling reliability signal per provider.
 *
 * Exactly one record exists per live provider. Updates are synchronous
 * in-memory writes on that provider's record only.
 */
export interface HealthMonitor {
  /** Passive observation: the final outcome of a delivery attempt run */
  recordOutcome(provider: string, outcome: AttemptOutcome, now?: number): void;

  /** Active observation: the result of a liveness probe */
  recordProbe(provider: string, ok: boolean, error?: string, now?: number): void;

  /** Read-only copies of every record */
  snapshot(): HealthSnapshot;

  /** Current state of one provider (undefined if unknown) */
  stateOf(provider: string): HealthState | undefined;

  /** Healthy and degraded providers are selectable in normal rotation */
  isSelectable(provider: string): boolean;

  /**
   * Take the single canary slot of an unhealthy provider whose cooldown has
   * elapsed. Returns false if the provider is not due or the slot is taken.
   */
  claimCanary(provider: string, now?: number): boolean;

  /** Give back a canary slot that was claimed but never used */
  releaseCanary(provider: string): void;

  /** Providers the probe loop should check */
  probeTargets(): string[];

  /** Keep records for surviving names, add new ones, drop removed ones */
  reconcile(providers: readonly string[]): void;
}

/**
 * Create a health monitor
 */
export const createHealthMonitor = (config: HealthMonitorConfig): HealthMonitor => {
  const { health, onTransition } = config;
  const records = new Map<string, ProviderHealth>();

  const notify = (transition: Transition | null): void => {
    if (!transition) {
      return;
    }
    debug.log(
      `Health ${transition.provider}: ${transition.from} -> ${transition.to}`
    );
    onTransition?.(transition);
  };

  const recordOutcome = (
    provider: string,
    outcome: AttemptOutcome,
    now: number = Date.now()
  ): void => {
    const record = records.get(provider);
    if (!record) {
      debug.warn(`recordOutcome: unknown provider "${provider}" (removed by reload?)`);
      return;
    }

    const signal = healthSignal(outcome);
    const canary = record.canaryClaimed;

    if (signal === "success") {
      notify(applySuccess(record, health, now));
    } else if (signal === "failure" && outcome.type !== "success") {
      notify(applyFailure(record, health, now, outcome.error.message, canary));
    } else if (canary) {
      // Neutral outcome: the canary told us nothing, let the next request try
      record.canaryClaimed = false;
    }
  };

  const recordProbe = (
    provider: string,
    ok: boolean,
    error?: string,
    now: number = Date.now()
  ): void => {
    const record = records.get(provider);
    if (!record) {
      return;
    }
    record.lastProbeAt = now;
    notify(
      ok
        ? applySuccess(record, health, now)
        : applyFailure(record, health, now, error ?? "probe failed")
    );
  };

  const snapshot = (): HealthSnapshot =>
    Object.fromEntries(
      [...records.entries()].map(([name, record]) => [
        name,
        Object.freeze({ ...record }),
      ])
    );

  const stateOf = (provider: string): HealthState | undefined =>
    records.get(provider)?.state;

  const isSelectable = (provider: string): boolean => {
    const state = stateOf(provider);
    return state === "healthy" || state === "degraded";
  };

  const claimCanary = (provider: string, now: number = Date.now()): boolean => {
    const record = records.get(provider);
    if (
      !record ||
      record.state !== "unhealthy" ||
      record.canaryClaimed ||
      record.nextProbeAt === null ||
      now < record.nextProbeAt
    ) {
      return false;
    }
    record.canaryClaimed = true;
    return true;
  };

  const releaseCanary = (provider: string): void => {
    const record = records.get(provider);
    if (record) {
      record.canaryClaimed = false;
    }
  };

  const probeTargets = (): string[] =>
    [...records.values()]
      .filter((r) => r.state !== "healthy")
      .map((r) => r.provider);

  const reconcile = (providers: readonly string[]): void => {
    const names = new Set(providers);
    for (const name of [...records.keys()]) {
      if (!names.has(name)) {
        records.delete(name);
      }
    }
    for (const name of names) {
      if (!records.has(name)) {
        records.set(name, createHealthRecord(name));
      }
    }
  };

  reconcile(config.providers ?? []);

  return {
    recordOutcome,
    recordProbe,
    snapshot,
    stateOf,
    isSelectable,
    claimCanary,
    releaseCanary,
    probeTargets,
    reconcile,
  };
};
