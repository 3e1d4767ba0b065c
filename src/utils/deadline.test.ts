import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createDeadline } from "./deadline.js";
import { sleep } from "./sleep.js";
import { TimeoutError } from "../types/errors.js";

describe("createDeadline", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("never aborts without a deadline or signal", () => {
    const scope = createDeadline(undefined, undefined, 1_000);

    vi.advanceTimersByTime(60_000);

    expect(scope.signal.aborted).toBe(false);
  });

  it("aborts with a caller timeout when the deadline passes", () => {
    const scope = createDeadline(1_100, undefined, 1_000);

    vi.advanceTimersByTime(99);
    expect(scope.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(scope.signal.aborted).toBe(true);

    const reason: unknown = scope.signal.reason;
    expect(reason).toBeInstanceOf(TimeoutError);
    expect(reason instanceof TimeoutError && reason.origin).toBe("caller");
    expect(reason instanceof TimeoutError && reason.timeoutMs).toBe(100);
  });

  it("aborts at once when the deadline is already past", () => {
    const scope = createDeadline(900, undefined, 1_000);

    expect(scope.signal.aborted).toBe(true);
  });

  it("follows the caller's signal", () => {
    const controller = new AbortController();
    const scope = createDeadline(undefined, controller.signal, 1_000);

    controller.abort();

    expect(scope.signal.aborted).toBe(true);
    expect(scope.signal.reason).toBeInstanceOf(TimeoutError);
  });

  it("stops the timer on dispose", () => {
    const scope = createDeadline(1_100, undefined, 1_000);

    scope.dispose();
    vi.advanceTimersByTime(1_000);

    expect(scope.signal.aborted).toBe(false);
  });
});

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    const done = vi.fn();
    const pending = sleep(200).then(done);

    await vi.advanceTimersByTimeAsync(199);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    const reason = new TimeoutError("caller");

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it("rejects at once on an aborted signal", async () => {
    const controller = new AbortController();
    const reason = new TimeoutError("caller");
    controller.abort(reason);

    await expect(sleep(10, controller.signal)).rejects.toBe(reason);
  });
});
