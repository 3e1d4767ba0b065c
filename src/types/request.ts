/**
 * Utterance handed over by the content layer
 */
export interface SpeakPayload {
  readonly text: string;
  readonly emotion: string;
  readonly language: string;
  readonly avatarId?: string;
  readonly voiceId?: string;
  readonly gesture?: string;
}

/**
 * Input accepted by `AvatarClient.speak`
 */
export interface SpeakInput {
  text: string;
  /** Default: "neutral" */
  emotion?: string;
  /** Default: "en" */
  language?: string;
  avatarId?: string;
  voiceId?: string;
  gesture?: string;
  /** Absolute deadline (epoch milliseconds) for the whole delivery */
  deadline?: number;
  /** Relative deadline; converted to `deadline` on entry */
  timeoutMs?: number;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * A validated request with its fingerprint
 */
export interface DeliveryRequest {
  readonly payload: SpeakPayload;
  /** Stable hash over the payload fields */
  readonly fingerprint: string;
  /** Absolute deadline (epoch milliseconds) */
  readonly deadline?: number;
  readonly signal?: AbortSignal;
}

/**
 * What a provider sent back, normalized by its adapter
 */
export interface SpeakResponse {
  /** HTTP status, or 200 for in-process adapters */
  readonly status: number;
  /** Parsed JSON body, or raw text when the body is not JSON */
  readonly body: unknown;
  /** Fields lifted from the body by the wire format (avatar_url, task_id, ...) */
  readonly fields: Readonly<Record<string, string>>;
}

/**
 * Successful delivery returned to the caller
 */
export interface DeliveryResult {
  readonly providerUsed: string;
  readonly response: SpeakResponse;
  readonly fingerprint: string;
  /** True when served from the response cache */
  readonly cached: boolean;
  /** Attempts made against `providerUsed` (0 for cache hits) */
  readonly attempts: number;
  readonly latencyMs: number;
  /** Epoch milliseconds of the original delivery */
  readonly deliveredAt: number;
}
