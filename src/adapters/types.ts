import type { AdapterKind } from "../types/provider.js";
import type { SpeakPayload, SpeakResponse } from "../types/request.js";

/**
 * Per-call options for an adapter
 */
export interface AttemptOptions {
  /** Caller cancellation (deadline or user signal) */
  signal?: AbortSignal;
  /** Overrides the adapter's attempt timeout */
  timeoutMs?: number;
}

/**
 * Uniform interface over every provider wire format.
 *
 * Both methods reject with relay errors only (see types/errors.ts).
 */
export interface SpeakAdapter {
  /** Provider name this adapter is bound to */
  readonly provider: string;
  readonly kind: AdapterKind;
  speak(payload: SpeakPayload, options?: AttemptOptions): Promise<SpeakResponse>;
  /** Lightweight liveness check; resolves when the provider looks alive */
  probe(options?: AttemptOptions): Promise<void>;
}
