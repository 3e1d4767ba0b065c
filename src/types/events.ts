import type { ErrorKind } from "./errors.js";
import type { HealthState } from "./health.js";

/**
 * Events emitted for an external monitoring collaborator
 */
export type RelayEvent =
  | { type: "cache_hit"; fingerprint: string; provider: string }
  | {
      type: "attempt";
      fingerprint: string;
      provider: string;
      attempt: number;
      outcome: "success" | "retryable" | "fatal";
      errorKind?: ErrorKind;
    }
  | { type: "admission_denied"; fingerprint: string; provider: string }
  | {
      type: "provider_failed";
      fingerprint: string;
      provider: string;
      errorKind: ErrorKind;
      attempts: number;
    }
  | {
      type: "delivered";
      fingerprint: string;
      provider: string;
      latencyMs: number;
      attempts: number;
    }
  | {
      type: "delivery_failed";
      /** Absent when the input failed validation */
      fingerprint?: string;
      errorKind: ErrorKind;
    }
  | {
      type: "health_transition";
      provider: string;
      from: HealthState;
      to: HealthState;
    }
  | { type: "probe"; provider: string; ok: boolean; error?: string };

export type RelayEventListener = (event: RelayEvent) => void;
