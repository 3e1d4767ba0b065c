/**
 * Error Classification
 *
 * Turns whatever an adapter threw into an attempt outcome, and answers
 * the two questions the engine and the façade ask about a failure.
 */

import {
  AvatarRelayError,
  ConfigurationError,
  InvalidRequestError,
  ProviderRejectedError,
  RateLimitedError,
  TimeoutError,
  TransportError,
} from "../types/errors.js";
import type { FailedOutcome } from "../types/outcome.js";

/**
 * Classify a thrown value.
 *
 * Payload rejections, caller defects and missing configuration are fatal
 * for the provider; everything else is retryable. Unknown throwables are
 * treated as transport failures.
 */
export const classifyError = (error: unknown, provider: string): FailedOutcome => {
  if (!(error instanceof AvatarRelayError)) {
    return {
      type: "retryable",
      error: new TransportError(
        provider,
        error instanceof Error ? error.message : String(error),
        { cause: error }
      ),
    };
  }

  if (
    error instanceof InvalidRequestError ||
    error instanceof ProviderRejectedError ||
    error instanceof ConfigurationError
  ) {
    return { type: "fatal", error };
  }

  return { type: "retryable", error };
};

/**
 * True when the caller's own deadline or signal ended the attempt
 */
export const isCallerTimeout = (error: AvatarRelayError): boolean =>
  error instanceof TimeoutError && error.origin === "caller";

/**
 * Whether another attempt against the same provider makes sense.
 * Rate limits fail over instead of waiting.
 */
export const retriesOnSameProvider = (outcome: FailedOutcome): boolean =>
  outcome.type === "retryable" &&
  !(outcome.error instanceof RateLimitedError) &&
  !isCallerTimeout(outcome.error);

/**
 * Whether a failure ends the whole delivery rather than just this provider
 */
export const abortsDelivery = (error: AvatarRelayError): boolean =>
  error instanceof InvalidRequestError || isCallerTimeout(error);
