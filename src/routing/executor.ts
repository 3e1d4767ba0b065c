/**
 * Request Execution Module
 *
 * Runs one delivery against one provider with bounded retries and
 * full-jitter exponential backoff.
 */

import type { SpeakAdapter } from "../adapters/types.js";
import type { SpeakPayload } from "../types/request.js";
import type { AttemptOutcome } from "../types/outcome.js";
import { AvatarRelayError, TimeoutError } from "../types/errors.js";
import { sleep as defaultSleep } from "../utils/sleep.js";
import { debug } from "../utils/debug.js";
import { computeBackoffDelay } from "./backoff.js";
import { classifyError, retriesOnSameProvider } from "./errors.js";
import type { ExecutionDependencies, ExecutionResult } from "./types.js";

/**
 * Make a single attempt and classify its result
 */
export const runAttempt = async (
  adapter: SpeakAdapter,
  payload: SpeakPayload,
  signal?: AbortSignal
): Promise<AttemptOutcome> => {
  try {
    const response = await adapter.speak(payload, { signal });
    return { type: "success", response };
  } catch (error) {
    return classifyError(error, adapter.provider);
  }
};

/**
 * Execute a delivery against a single provider with retry logic
 *
 * 1. Attempt the call
 * 2. Stop on success, on a fatal failure, on a rate limit or on the
 *    caller's deadline
 * 3. Otherwise wait a jittered backoff and try again, up to `maxAttempts`
 *
 * A caller abort during the backoff wait ends the run with a caller
 * timeout. Never throws.
 */
export const executeWithRetry = async (
  adapter: SpeakAdapter,
  payload: SpeakPayload,
  signal: AbortSignal | undefined,
  deps: ExecutionDependencies
): Promise<ExecutionResult> => {
  const { retry, random = Math.random, sleep = defaultSleep, onAttempt } = deps;
  const maxAttempts = Math.max(1, Math.floor(retry.maxAttempts));

  let attempt = 0;
  for (;;) {
    attempt++;
    const outcome = await runAttempt(adapter, payload, signal);
    onAttempt?.(attempt, outcome);

    if (outcome.type === "success") {
      return { outcome, attempts: attempt };
    }

    if (!retriesOnSameProvider(outcome) || attempt >= maxAttempts) {
      debug.log(
        `${adapter.provider}: giving up after ${attempt} attempt(s): ${outcome.error.message}`
      );
      return { outcome, attempts: attempt };
    }

    const delay = computeBackoffDelay(attempt, retry, random);
    debug.log(`${adapter.provider}: attempt ${attempt} failed, retrying in ${delay}ms`);

    try {
      await sleep(delay, signal);
    } catch (error) {
      const reason =
        error instanceof AvatarRelayError ? error : new TimeoutError("caller", adapter.provider);
      return { outcome: classifyError(reason, adapter.provider), attempts: attempt };
    }
  }
};
