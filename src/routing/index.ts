/**
 * Routing Module
 *
 * Provider selection and per-provider retry execution.
 */

export type {
  Candidate,
  ExecutionDependencies,
  ExecutionResult,
  RegisteredProvider,
  SelectionDependencies,
  SelectionError,
} from "./types.js";

export {
  createSelector,
  filterCapable,
  orderByTierAndPriority,
  type Selector,
} from "./provider-selection.js";

export { executeWithRetry, runAttempt } from "./executor.js";
export { computeBackoffCap, computeBackoffDelay } from "./backoff.js";
export {
  classifyError,
  isCallerTimeout,
  retriesOnSameProvider,
  abortsDelivery,
} from "./errors.js";
