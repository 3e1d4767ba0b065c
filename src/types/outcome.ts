import type { AvatarRelayError } from "./errors.js";
import type { SpeakResponse } from "./request.js";

/**
 * Classified result of a single attempt against one provider.
 *
 * - `success`: the provider accepted the utterance
 * - `retryable`: worth another attempt (timeout, transport, 5xx) unless the
 *   error says otherwise (rate limits fail over instead)
 * - `fatal`: never retried on this provider; `InvalidRequestError` also stops
 *   failover
 */
export type AttemptOutcome =
  | { readonly type: "success"; readonly response: SpeakResponse }
  | { readonly type: "retryable"; readonly error: AvatarRelayError }
  | { readonly type: "fatal"; readonly error: AvatarRelayError };

export type FailedOutcome = Exclude<AttemptOutcome, { type: "success" }>;

export const isSuccess = (
  outcome: AttemptOutcome
): outcome is Extract<AttemptOutcome, { type: "success" }> =>
  outcome.type === "success";
