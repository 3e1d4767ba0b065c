import { TimeoutError } from "../types/errors.js";

/**
 * Cancellation scope for one delivery
 */
export interface Deadline {
  /** Aborts with a caller-origin `TimeoutError` */
  readonly signal: AbortSignal;
  /** Release the timer and the listener on the caller's signal */
  dispose(): void;
}

/**
 * Combine an absolute deadline and an optional caller signal into one
 * abort signal. Whatever fires first aborts with a caller-origin
 * TimeoutError, which the retry engine never charges to a provider.
 */
export const createDeadline = (
  deadline?: number,
  callerSignal?: AbortSignal,
  now: number = Date.now()
): Deadline => {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const abort = (): void => {
    if (!controller.signal.aborted) {
      const budget = deadline !== undefined ? Math.max(0, deadline - now) : undefined;
      controller.abort(new TimeoutError("caller", undefined, budget));
    }
  };

  if (callerSignal?.aborted) {
    abort();
  } else {
    callerSignal?.addEventListener("abort", abort, { once: true });
  }

  if (deadline !== undefined && !controller.signal.aborted) {
    const remaining = deadline - now;
    if (remaining <= 0) {
      abort();
    } else {
      timer = setTimeout(abort, remaining);
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      callerSignal?.removeEventListener("abort", abort);
    },
  };
};
