/**
 * Provider health tiers, best first
 */
export type HealthState = "healthy" | "degraded" | "unhealthy";

export const HEALTH_TIER: Record<HealthState, number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2,
};

/**
 * Mutable health record, owned by the health monitor.
 * Everything outside the monitor sees `Readonly` copies.
 */
export interface ProviderHealth {
  provider: string;
  state: HealthState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  /** Consecutive failures since the last state change */
  failuresInState: number;
  /** Times this provider has entered the unhealthy state */
  flapCount: number;
  /** Epoch ms of the last active probe */
  lastProbeAt: number | null;
  /** Epoch ms of the last recorded outcome (passive or probe) */
  lastOutcomeAt: number | null;
  /** While unhealthy: epoch ms when the canary may be offered */
  nextProbeAt: number | null;
  /** True while a canary request holds the single re-admission slot */
  canaryClaimed: boolean;
  lastError: string | null;
}

export type HealthSnapshot = Readonly<Record<string, Readonly<ProviderHealth>>>;

/**
 * How a recorded outcome counts toward health
 */
export type HealthSignal = "success" | "failure" | "neutral";
