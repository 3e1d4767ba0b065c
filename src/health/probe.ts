import type { ProbeConfig } from "../types/config.js";
import { debug } from "../utils/debug.js";
import type { HealthMonitor } from "./monitor.js";

/**
 * Liveness check for one provider. Resolves when the provider is alive,
 * rejects otherwise. Must give up when `signal` aborts.
 */
export type ProbeFn = (provider: string, signal: AbortSignal) => Promise<void>;

/**
 * Result of probing one provider
 */
export interface ProbeResult {
  provider: string;
  ok: boolean;
  error?: string;
}

export interface ProbeLoopConfig {
  monitor: HealthMonitor;
  probe: ProbeFn;
  config: ProbeConfig;
  /** Called once per probed provider */
  onProbe?: (result: ProbeResult) => void;
  /** Source of randomness for jitter. Default: Math.random */
  random?: () => number;
  /** Clock stamped on probe results. Default: Date.now */
  now?: () => number;
}

/**
 * Background prober of degraded and unhealthy providers
 */
export interface ProbeLoop {
  start(): void;
  stop(): void;
  isRunning(): boolean;
  /** Probe the given providers (default: the monitor's targets) once */
  runOnce(providers?: readonly string[]): Promise<ProbeResult[]>;
}

/**
 * Interval with +/- jitter so many clients do not probe in lockstep
 */
export const jitteredInterval = (
  intervalMs: number,
  jitterRatio: number,
  random: () => number = Math.random
): number => {
  const spread = intervalMs * Math.min(Math.max(jitterRatio, 0), 1);
  return Math.max(0, Math.round(intervalMs - spread + random() * 2 * spread));
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Create a probe loop.
 *
 * Probing runs on its own timer and never inline with delivery requests.
 * Its timer is unref'd so an idle client does not keep the process alive.
 */
export const createProbeLoop = (loopConfig: ProbeLoopConfig): ProbeLoop => {
  const {
    monitor,
    probe,
    config,
    onProbe,
    random = Math.random,
    now = Date.now,
  } = loopConfig;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;

  const probeOne = async (provider: string): Promise<ProbeResult> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.timeoutMs);
    try {
      await probe(provider, controller.signal);
      return { provider, ok: true };
    } catch (error) {
      return { provider, ok: false, error: describeError(error) };
    } finally {
      clearTimeout(timeout);
    }
  };

  const runOnce = async (
    providers: readonly string[] = monitor.probeTargets()
  ): Promise<ProbeResult[]> => {
    const results = await Promise.all(providers.map(probeOne));
    for (const result of results) {
      monitor.recordProbe(result.provider, result.ok, result.error, now());
      debug.log(
        `Probe ${result.provider}: ${result.ok ? "ok" : `failed (${result.error})`}`
      );
      onProbe?.(result);
    }
    return results;
  };

  const schedule = (): void => {
    if (!running) {
      return;
    }
    timer = setTimeout(() => {
      void runOnce()
        .catch((error: unknown) => {
          debug.error("Probe round failed:", error);
        })
        .finally(schedule);
    }, jitteredInterval(config.intervalMs, config.jitterRatio, random));
    timer.unref?.();
  };

  const start = (): void => {
    if (running || !config.enabled) {
      return;
    }
    running = true;
    schedule();
  };

  const stop = (): void => {
    running = false;
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  return { start, stop, isRunning: () => running, runOnce };
};
