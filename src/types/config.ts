import type {
  AdapterKind,
  CredentialRef,
  ProviderDescriptor,
  RateLimitPolicy,
} from "./provider.js";
import type { RelayEventListener } from "./events.js";

/**
 * Configuration for a single provider, as written by users
 */
export interface ProviderConfig {
  /** Unique provider name */
  name: string;
  /** Wire format. Default: "canonical" */
  adapter?: AdapterKind;
  /** Base URL of the provider API */
  baseUrl: string;
  /** API key source */
  credential?: CredentialRef;
  /** Supported language tags. Default: any */
  languages?: string[];
  /** Supported emotion tags. Default: any */
  emotions?: string[];
  /** Priority for routing (lower = higher priority). Default: 0 */
  priority?: number;
  /** Whether this provider is enabled. Default: true */
  enabled?: boolean;
  /** Token bucket. Default: unlimited */
  rateLimit?: RateLimitPolicy;
  /** Per-attempt timeout override in milliseconds */
  timeoutMs?: number;
  /** Avatar to drive when the request does not name one */
  avatarId?: string;
}

/**
 * Health state machine thresholds
 */
export interface HealthConfig {
  /** Consecutive failures before HEALTHY -> DEGRADED. Default: 3 */
  degradeAfter: number;
  /** Further consecutive failures before DEGRADED -> UNHEALTHY. Default: 2 */
  unhealthyAfter: number;
  /** Consecutive successes before returning to HEALTHY. Default: 2 */
  recoverAfter: number;
  /** First cooldown once UNHEALTHY. Default: 10000 */
  cooldownBaseMs: number;
  /** Cooldown cap. Default: 300000 */
  cooldownMaxMs: number;
  /** Cooldown growth per flap. Default: 2 */
  cooldownMultiplier: number;
}

/**
 * Retry configuration for one provider
 */
export interface RetryConfig {
  /** Attempts per provider, first one included. Default: 3 */
  maxAttempts: number;
  /** Backoff before the second attempt. Default: 200 */
  baseDelayMs: number;
  /** Maximum backoff delay in milliseconds. Default: 5000 */
  maxDelayMs: number;
}

/**
 * Response cache configuration
 */
export interface CacheConfig {
  /** Default: true */
  enabled: boolean;
  /** Entry lifetime in milliseconds. Default: 5000 */
  ttlMs: number;
  /** Maximum entries before LRU eviction. Default: 500 */
  capacity: number;
}

/**
 * Background liveness probing
 */
export interface ProbeConfig {
  /** Default: true */
  enabled: boolean;
  /** Default: 15000 */
  intervalMs: number;
  /** Fraction of the interval used as +/- jitter. Default: 0.2 */
  jitterRatio: number;
  /** Timeout of a single probe. Default: 3000 */
  timeoutMs: number;
}

/**
 * Main configuration for the avatar client
 */
export interface AvatarClientConfig {
  /** Provider configurations */
  providers: ProviderConfig[];
  health?: Partial<HealthConfig>;
  retry?: Partial<RetryConfig>;
  cache?: Partial<CacheConfig>;
  probe?: Partial<ProbeConfig>;
  /** Per-attempt HTTP timeout. Default: 10000 */
  attemptTimeoutMs?: number;
  /** Longest accepted text. Default: 5000 */
  maxTextLength?: number;
  /** Avatar used when neither request nor provider names one */
  avatarId?: string;
  /** Turn on console debug output */
  debug?: boolean;
  /** Receives delivery and health events */
  onEvent?: RelayEventListener;
}

/**
 * Validated and normalized configuration with defaults applied
 */
export interface ResolvedConfig {
  providers: ProviderDescriptor[];
  health: HealthConfig;
  retry: RetryConfig;
  cache: CacheConfig;
  probe: ProbeConfig;
  attemptTimeoutMs: number;
  maxTextLength: number;
  avatarId?: string;
  debug: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  health: {
    degradeAfter: 3,
    unhealthyAfter: 2,
    recoverAfter: 2,
    cooldownBaseMs: 10_000,
    cooldownMaxMs: 300_000,
    cooldownMultiplier: 2,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 200,
    maxDelayMs: 5_000,
  },
  cache: {
    enabled: true,
    ttlMs: 5_000,
    capacity: 500,
  },
  probe: {
    enabled: true,
    intervalMs: 15_000,
    jitterRatio: 0.2,
    timeoutMs: 3_000,
  },
  attemptTimeoutMs: 10_000,
  maxTextLength: 5_000,
} as const;

/**
 * Turn a user provider entry into a frozen descriptor
 */
export const toDescriptor = (p: ProviderConfig): ProviderDescriptor =>
  Object.freeze({
    name: p.name,
    adapter: p.adapter ?? "canonical",
    baseUrl: p.baseUrl.replace(/\/+$/, ""),
    credential: p.credential,
    capabilities: Object.freeze({
      languages: p.languages ? Object.freeze([...p.languages]) : undefined,
      emotions: p.emotions ? Object.freeze([...p.emotions]) : undefined,
    }),
    priority: p.priority ?? 0,
    rateLimit: p.rateLimit,
    timeoutMs: p.timeoutMs,
    avatarId: p.avatarId,
  });

/**
 * Overlay the defined keys of a partial section onto its defaults
 */
const withDefaults = <T extends object>(defaults: T, partial?: Partial<T>): T => {
  const merged = { ...defaults };
  if (!partial) {
    return merged;
  }
  for (const key of Object.keys(defaults) as (keyof T)[]) {
    const value = partial[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
};

/**
 * Resolve configuration with defaults
 */
export function resolveConfig(config: AvatarClientConfig): ResolvedConfig {
  return {
    providers: config.providers
      .filter((p) => p.enabled !== false)
      .map(toDescriptor),
    health: withDefaults<HealthConfig>({ ...DEFAULT_CONFIG.health }, config.health),
    retry: withDefaults<RetryConfig>({ ...DEFAULT_CONFIG.retry }, config.retry),
    cache: withDefaults<CacheConfig>({ ...DEFAULT_CONFIG.cache }, config.cache),
    probe: withDefaults<ProbeConfig>({ ...DEFAULT_CONFIG.probe }, config.probe),
    attemptTimeoutMs:
      config.attemptTimeoutMs ?? DEFAULT_CONFIG.attemptTimeoutMs,
    maxTextLength: config.maxTextLength ?? DEFAULT_CONFIG.maxTextLength,
    avatarId: config.avatarId,
    debug: config.debug ?? false,
  };
}
