// Provider types
export {
  type AdapterKind,
  type CredentialRef,
  type ProviderCapabilities,
  type RateLimitPolicy,
  type ProviderDescriptor,
  ADAPTER_KINDS,
  isAdapterKind,
  providerSupports,
} from "./provider.js";

// Request and response types
export {
  type SpeakPayload,
  type SpeakInput,
  type DeliveryRequest,
  type SpeakResponse,
  type DeliveryResult,
} from "./request.js";

// Attempt outcomes
export { type AttemptOutcome, type FailedOutcome, isSuccess } from "./outcome.js";

// Health types
export {
  type HealthState,
  type ProviderHealth,
  type HealthSnapshot,
  type HealthSignal,
  HEALTH_TIER,
} from "./health.js";

// Configuration types
export {
  type ProviderConfig,
  type HealthConfig,
  type RetryConfig,
  type CacheConfig,
  type ProbeConfig,
  type AvatarClientConfig,
  type ResolvedConfig,
  DEFAULT_CONFIG,
  resolveConfig,
  toDescriptor,
} from "./config.js";

// Error types
export {
  type ErrorKind,
  type TimeoutOrigin,
  type RateLimitOrigin,
  type ProviderAttemptReport,
  AvatarRelayError,
  TimeoutError,
  TransportError,
  ProviderServerError,
  ProviderRejectedError,
  InvalidRequestError,
  RateLimitedError,
  AllProvidersExhaustedError,
  ConfigurationError,
  isAvatarRelayError,
} from "./errors.js";

// Events
export { type RelayEvent, type RelayEventListener } from "./events.js";

// Re-export Result type from neverthrow for convenience
export { type Result, type ResultAsync, ok, err } from "neverthrow";
