/**
 * Avatar Client
 *
 * Public entry point. Delivers an utterance to one of several avatar
 * providers:
 * - Response cache lookup by payload fingerprint
 * - Ordered candidates from the selector (capability, health, priority)
 * - Rate-limiter admission, then retries against one provider at a time
 * - Failover to the next candidate, with health updated on the way
 */

import { ResultAsync } from "neverthrow";
import type { WireFormat } from "./config/schema.js";
import { getWireFormats } from "./config/loader.js";
import type { AdapterFactory } from "./adapters/index.js";
import { createResponseCache } from "./cache/response-cache.js";
import { fingerprint } from "./cache/fingerprint.js";
import { createHealthMonitor } from "./health/monitor.js";
import { createProbeLoop, type ProbeResult } from "./health/probe.js";
import { createRateLimiter, type BucketLevel } from "./rate-limit/limiter.js";
import { createProviderRegistry } from "./registry/registry.js";
import { createSelector } from "./routing/provider-selection.js";
import { executeWithRetry } from "./routing/executor.js";
import { abortsDelivery } from "./routing/errors.js";
import type { Candidate, SelectionError } from "./routing/types.js";
import {
  type AvatarClientConfig,
  type ProviderConfig,
  resolveConfig,
  toDescriptor,
} from "./types/config.js";
import {
  AllProvidersExhaustedError,
  AvatarRelayError,
  ConfigurationError,
  InvalidRequestError,
  RateLimitedError,
  TimeoutError,
  isAvatarRelayError,
  type ProviderAttemptReport,
} from "./types/errors.js";
import type { RelayEvent } from "./types/events.js";
import type { HealthSnapshot } from "./types/health.js";
import type { AdapterKind } from "./types/provider.js";
import type { DeliveryRequest, DeliveryResult, SpeakInput } from "./types/request.js";
import { createDeadline } from "./utils/deadline.js";
import { debug, setDebugEnabled } from "./utils/debug.js";
import { validateSpeakInput } from "./validation.js";

/**
 * Counters and state for monitoring
 */
export interface ClientStats {
  providers: string[];
  cacheSize: number;
  health: HealthSnapshot;
  buckets: BucketLevel[];
  probing: boolean;
  deliveries: {
    delivered: number;
    cacheHits: number;
    failed: number;
  };
}

/**
 * Avatar client instance interface
 */
export interface AvatarClient {
  /**
   * Deliver an utterance. Rejects with an AvatarRelayError subclass.
   */
  speak(input: SpeakInput): Promise<DeliveryResult>;

  /**
   * Same as `speak`, with the failure as a value
   */
  trySpeak(input: SpeakInput): ResultAsync<DeliveryResult, AvatarRelayError>;

  /**
   * Replace the provider list. In-flight deliveries finish on the
   * providers they already selected.
   */
  reload(providers: ProviderConfig[]): void;

  /**
   * Read-only copy of every provider's health record
   */
  getHealthSnapshot(): HealthSnapshot;

  getStats(): ClientStats;

  /**
   * Drop every cached response. Returns how many were dropped.
   */
  clearCache(): number;

  /**
   * Probe one provider, or all of them, right now. Results feed the
   * health monitor like background probes do.
   */
  checkHealth(provider?: string): Promise<ProbeResult[]>;

  /**
   * Start background probing of degraded and unhealthy providers.
   * The client starts it on creation unless `probe.enabled` is false.
   */
  startProbing(): void;

  stopProbing(): void;

  /**
   * Stop probing and refuse further deliveries
   */
  close(): Promise<void>;
}

/**
 * Injection points, mostly for tests
 */
export interface AvatarClientOptions {
  /** Wire formats. Default: the bundled config/adapters/*.yml */
  formats?: ReadonlyMap<AdapterKind, WireFormat>;
  /** Adapter factory. Default: adapters/createAdapter */
  createAdapter?: AdapterFactory;
  /** Environment for `{ env }` credentials. Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Clock. Default: Date.now */
  now?: () => number;
  /** Jitter source for backoff and probing. Default: Math.random */
  random?: () => number;
  /** Backoff wait. Default: utils/sleep */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const toRelayError = (error: unknown): AvatarRelayError =>
  isAvatarRelayError(error)
    ? error
    : new AvatarRelayError(
        "transport",
        error instanceof Error ? error.message : String(error),
        true
      );

const selectionFailure = (error: SelectionError): AvatarRelayError => {
  switch (error.type) {
    case "no_capable_providers":
      return new InvalidRequestError([
        `no provider supports language "${error.language}" with emotion "${error.emotion}"`,
      ]);
    case "no_available_providers":
      return new AllProvidersExhaustedError([]);
  }
};

/**
 * Create an avatar client
 *
 * @example
 * ```typescript
 * const client = createAvatarClient({
 *   providers: [
 *     { name: "duix", adapter: "duix", baseUrl: "https://api.duix.com", credential: { env: "DUIX_API_KEY" } },
 *     { name: "local", baseUrl: "http://localhost:8000", priority: 5 },
 *   ],
 * });
 *
 * const result = await client.speak({ text: "What a goal!", emotion: "excited" });
 * console.log(result.providerUsed, result.response.fields);
 * ```
 */
export const createAvatarClient = (
  config: AvatarClientConfig,
  options: AvatarClientOptions = {}
): AvatarClient => {
  const resolved = resolveConfig(config);
  const now = options.now ?? Date.now;
  const random = options.random ?? Math.random;

  if (config.debug !== undefined) {
    setDebugEnabled(config.debug);
  }

  const stats = { delivered: 0, cacheHits: 0, failed: 0 };
  let closed = false;

  const emit = (event: RelayEvent): void => {
    if (!config.onEvent) {
      return;
    }
    try {
      config.onEvent(event);
    } catch (error) {
      debug.error(`onEvent listener threw on "${event.type}":`, error);
    }
  };

  const monitor = createHealthMonitor({
    health: resolved.health,
    onTransition: ({ provider, from, to }) =>
      emit({ type: "health_transition", provider, from, to }),
  });
  const limiter = createRateLimiter();
  const cache = createResponseCache({
    ttlMs: resolved.cache.ttlMs,
    capacity: resolved.cache.capacity,
  });

  const registry = createProviderRegistry(resolved.providers, {
    monitor,
    limiter,
    createAdapter: options.createAdapter,
    adapterContext: {
      formats: options.formats ?? getWireFormats(),
      attemptTimeoutMs: resolved.attemptTimeoutMs,
      avatarId: resolved.avatarId,
      env: options.env,
    },
  });

  const selector = createSelector({
    providers: () => registry.list(),
    monitor,
    now,
  });

  const probeLoop = createProbeLoop({
    monitor,
    config: resolved.probe,
    random,
    now,
    probe: async (provider, signal) => {
      const registered = registry.get(provider);
      if (!registered) {
        throw new ConfigurationError(`Unknown provider "${provider}"`);
      }
      await registered.adapter.probe({ signal, timeoutMs: resolved.probe.timeoutMs });
    },
    onProbe: ({ provider, ok, error }) => emit({ type: "probe", provider, ok, error }),
  });

  // No-op when probing is disabled
  probeLoop.start();

  /**
   * Capacity error when every candidate was refused locally
   */
  const capacityError = (denied: readonly string[]): RateLimitedError => {
    const at = now();
    const waits = denied.map((p) => limiter.msUntilAvailable(p, at));
    const soonest = waits.length > 0 ? Math.min(...waits) : 0;
    return new RateLimitedError(denied, "local", new Date(at + soonest));
  };

  /**
   * Walk the candidate list until one provider succeeds
   */
  const deliverToCandidates = async (
    candidates: readonly Candidate[],
    request: DeliveryRequest,
    signal: AbortSignal,
    started: number
  ): Promise<DeliveryResult> => {
    const { payload, fingerprint: payloadFingerprint } = request;
    const reports: ProviderAttemptReport[] = [];
    const denied: string[] = [];
    const used = new Set<string>();

    try {
      for (const candidate of candidates) {
        const { descriptor, adapter } = candidate.provider;
        const name = descriptor.name;

        if (signal.aborted) {
          throw signal.reason instanceof AvatarRelayError
            ? signal.reason
            : new TimeoutError("caller");
        }

        if (!limiter.tryAcquire(name, now())) {
          debug.log(`Admission denied by ${name}, trying next candidate`);
          emit({ type: "admission_denied", fingerprint: payloadFingerprint, provider: name });
          denied.push(name);
          reports.push({
            provider: name,
            attempts: 0,
            error: new RateLimitedError([name], "local"),
          });
          continue;
        }

        used.add(name);
        const run = await executeWithRetry(adapter, payload, signal, {
          // A canary is a single trial request
          retry: candidate.canary ? { ...resolved.retry, maxAttempts: 1 } : resolved.retry,
          random,
          sleep: options.sleep,
          onAttempt: (attempt, outcome) =>
            emit({
              type: "attempt",
              fingerprint: payloadFingerprint,
              provider: name,
              attempt,
              outcome: outcome.type,
              errorKind: outcome.type === "success" ? undefined : outcome.error.kind,
            }),
        });

        monitor.recordOutcome(name, run.outcome, now());

        if (run.outcome.type === "success") {
          const deliveredAt = now();
          const result: DeliveryResult = {
            providerUsed: name,
            response: run.outcome.response,
            fingerprint: payloadFingerprint,
            cached: false,
            attempts: run.attempts,
            latencyMs: deliveredAt - started,
            deliveredAt,
          };
          if (resolved.cache.enabled) {
            cache.put(
              payloadFingerprint,
              { ...result, response: structuredClone(result.response) },
              resolved.cache.ttlMs,
              deliveredAt
            );
          }
          return result;
        }

        const { error } = run.outcome;
        if (error instanceof RateLimitedError && error.origin === "provider") {
          limiter.penalize(name, error.resetAt, now());
        }

        reports.push({ provider: name, attempts: run.attempts, error });
        emit({
          type: "provider_failed",
          fingerprint: payloadFingerprint,
          provider: name,
          errorKind: error.kind,
          attempts: run.attempts,
        });

        if (abortsDelivery(error)) {
          throw error;
        }
      }
    } finally {
      for (const candidate of candidates) {
        if (candidate.canary && !used.has(candidate.provider.descriptor.name)) {
          monitor.releaseCanary(candidate.provider.descriptor.name);
        }
      }
    }

    if (denied.length > 0 && denied.length === reports.length) {
      throw capacityError(denied);
    }
    throw new AllProvidersExhaustedError(reports);
  };

  const deliver = async (
    input: SpeakInput,
    trace: { fingerprint?: string }
  ): Promise<DeliveryResult> => {
    if (closed) {
      throw new ConfigurationError("Client is closed");
    }

    const started = now();
    const validated = validateSpeakInput(input, resolved.maxTextLength, started);
    if (validated.isErr()) {
      throw validated.error;
    }

    const request: DeliveryRequest = {
      payload: validated.value.payload,
      fingerprint: fingerprint(validated.value.payload),
      deadline: validated.value.deadline,
      signal: input.signal,
    };
    const payloadFingerprint = request.fingerprint;
    trace.fingerprint = payloadFingerprint;

    if (resolved.cache.enabled) {
      const hit = cache.get(payloadFingerprint, started);
      if (hit) {
        debug.log(`Cache hit for ${payloadFingerprint.slice(0, 12)} (${hit.providerUsed})`);
        stats.cacheHits++;
        emit({ type: "cache_hit", fingerprint: payloadFingerprint, provider: hit.providerUsed });
        return {
          ...hit.result,
          response: structuredClone(hit.result.response),
          cached: true,
          attempts: 0,
          latencyMs: now() - started,
        };
      }
    }

    const selection = selector.candidates(request.payload);
    if (selection.isErr()) {
      throw selectionFailure(selection.error);
    }

    const scope = createDeadline(request.deadline, request.signal, started);
    try {
      const result = await deliverToCandidates(selection.value, request, scope.signal, started);
      stats.delivered++;
      debug.log(`Delivered via ${result.providerUsed} in ${result.latencyMs}ms`);
      emit({
        type: "delivered",
        fingerprint: payloadFingerprint,
        provider: result.providerUsed,
        latencyMs: result.latencyMs,
        attempts: result.attempts,
      });
      return result;
    } finally {
      scope.dispose();
    }
  };

  const speak = async (input: SpeakInput): Promise<DeliveryResult> => {
    const trace: { fingerprint?: string } = {};
    try {
      return await deliver(input, trace);
    } catch (error) {
      const relayError = toRelayError(error);
      stats.failed++;
      debug.warn(`Delivery failed: ${relayError.message}`);
      emit({
        type: "delivery_failed",
        fingerprint: trace.fingerprint,
        errorKind: relayError.kind,
      });
      throw relayError;
    }
  };

  const trySpeak = (input: SpeakInput): ResultAsync<DeliveryResult, AvatarRelayError> =>
    ResultAsync.fromPromise(speak(input), toRelayError);

  const reload = (providers: ProviderConfig[]): void => {
    registry.reload(providers.filter((p) => p.enabled !== false).map(toDescriptor));
  };

  const checkHealth = async (provider?: string): Promise<ProbeResult[]> => {
    if (provider !== undefined && !registry.get(provider)) {
      throw new ConfigurationError(`Unknown provider "${provider}"`);
    }
    return probeLoop.runOnce(provider !== undefined ? [provider] : registry.names());
  };

  const getStats = (): ClientStats => ({
    providers: registry.names(),
    cacheSize: cache.size(),
    health: monitor.snapshot(),
    buckets: limiter.levels(now()),
    probing: probeLoop.isRunning(),
    deliveries: { ...stats },
  });

  const close = async (): Promise<void> => {
    closed = true;
    probeLoop.stop();
  };

  return {
    speak,
    trySpeak,
    reload,
    getHealthSnapshot: () => monitor.snapshot(),
    getStats,
    clearCache: () => cache.clear(),
    checkHealth,
    startProbing: () => probeLoop.start(),
    stopProbing: () => probeLoop.stop(),
    close,
  };
};
