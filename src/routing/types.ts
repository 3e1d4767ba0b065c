/**
 * Routing Module Types
 *
 * Shared types for provider selection and request execution.
 */

import type { SpeakAdapter } from "../adapters/types.js";
import type { HealthMonitor } from "../health/monitor.js";
import type { RetryConfig } from "../types/config.js";
import type { HealthState } from "../types/health.js";
import type { AttemptOutcome } from "../types/outcome.js";
import type { ProviderDescriptor } from "../types/provider.js";

/**
 * A descriptor paired with the adapter built for it
 */
export interface RegisteredProvider {
  readonly descriptor: ProviderDescriptor;
  readonly adapter: SpeakAdapter;
}

/**
 * One entry of the ordered candidate list
 */
export interface Candidate {
  readonly provider: RegisteredProvider;
  /** Health tier at selection time */
  readonly state: HealthState;
  /** True for the single re-admission trial of an unhealthy provider */
  readonly canary: boolean;
}

/**
 * Why no candidate list could be produced
 */
export type SelectionError =
  | { type: "no_capable_providers"; language: string; emotion: string }
  | { type: "no_available_providers"; unavailable: string[] };

/**
 * Dependencies required for provider selection
 */
export interface SelectionDependencies {
  /** Current providers; read on every call so reloads take effect */
  providers: () => readonly RegisteredProvider[];
  monitor: HealthMonitor;
  now?: () => number;
}

/**
 * Dependencies required for request execution against one provider
 */
export interface ExecutionDependencies {
  retry: RetryConfig;
  /** Source of jitter. Default: Math.random */
  random?: () => number;
  /** Backoff wait. Default: utils/sleep */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Called after every attempt */
  onAttempt?: (attempt: number, outcome: AttemptOutcome) => void;
}

/**
 * Terminal result of running one provider
 */
export interface ExecutionResult {
  readonly outcome: AttemptOutcome;
  /** Attempts actually made, never more than `retry.maxAttempts` */
  readonly attempts: number;
}
