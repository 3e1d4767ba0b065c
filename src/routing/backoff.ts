import type { RetryConfig } from "../types/config.js";

/**
 * Upper bound of the delay after attempt `attempt` (1-based):
 * min(base * 2^(attempt-1), max)
 */
export const computeBackoffCap = (
  attempt: number,
  policy: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs">
): number => {
  const exponent = Math.max(0, attempt - 1);
  const raw = policy.baseDelayMs * Math.pow(2, exponent);
  return Math.max(0, Math.min(raw, policy.maxDelayMs));
};

/**
 * Full jitter: a uniform delay in [0, cap]
 */
export const computeBackoffDelay = (
  attempt: number,
  policy: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random
): number => {
  const cap = computeBackoffCap(attempt, policy);
  const r = Math.min(1, Math.max(0, random()));
  return Math.floor(r * cap);
};
