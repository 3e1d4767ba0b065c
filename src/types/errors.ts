/**
 * Discriminant shared by every delivery error
 */
export type ErrorKind =
  | "timeout"
  | "transport"
  | "provider_server"
  | "provider_rejected"
  | "invalid_request"
  | "rate_limited"
  | "all_providers_exhausted"
  | "configuration";

/**
 * Base error class for avatar-relay errors
 */
export class AvatarRelayError extends Error {
  readonly kind: ErrorKind;
  /**
   * True when the same request may succeed later unchanged.
   * False means the caller has to fix the request or the configuration.
   */
  readonly retryLater: boolean;

  constructor(kind: ErrorKind, message: string, retryLater: boolean) {
    super(message);
    this.name = "AvatarRelayError";
    this.kind = kind;
    this.retryLater = retryLater;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Which side ran out of time
 */
export type TimeoutOrigin = "provider" | "caller";

/**
 * Error thrown when an attempt or the caller's deadline times out
 */
export class TimeoutError extends AvatarRelayError {
  /** Provider being called, if any */
  readonly provider?: string;
  readonly timeoutMs?: number;
  /**
   * `provider` when the attempt timer fired or the provider answered 408,
   * `caller` when the request deadline or signal cut the delivery short.
   */
  readonly origin: TimeoutOrigin;

  constructor(origin: TimeoutOrigin, provider?: string, timeoutMs?: number) {
    const target = provider ? ` to ${provider}` : "";
    const after = timeoutMs !== undefined ? ` after ${timeoutMs}ms` : "";
    super(
      "timeout",
      origin === "caller"
        ? `Delivery deadline exceeded${target}${after}`
        : `Request${target} timed out${after}`,
      true
    );
    this.name = "TimeoutError";
    this.origin = origin;
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when the connection to a provider fails
 */
export class TransportError extends AvatarRelayError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super("transport", `Transport error for ${provider}: ${message}`, true);
    this.name = "TransportError";
    this.provider = provider;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Error thrown when a provider answers with a 5xx status
 */
export class ProviderServerError extends AvatarRelayError {
  readonly provider: string;
  readonly statusCode: number;
  /** Raw error response from provider */
  readonly rawError?: string;

  constructor(provider: string, statusCode: number, rawError?: string) {
    super("provider_server", `Provider ${provider} error (${statusCode})`, true);
    this.name = "ProviderServerError";
    this.provider = provider;
    this.statusCode = statusCode;
    this.rawError = rawError;
  }
}

/**
 * Error thrown when a provider refuses this particular payload.
 * Another provider may still accept it.
 */
export class ProviderRejectedError extends AvatarRelayError {
  readonly provider: string;
  /** HTTP status, or 0 when the provider could not be called at all */
  readonly statusCode: number;
  readonly reason: string;

  constructor(provider: string, statusCode: number, reason: string) {
    super(
      "provider_rejected",
      `Provider ${provider} rejected the request (${statusCode}): ${reason}`,
      true
    );
    this.name = "ProviderRejectedError";
    this.provider = provider;
    this.statusCode = statusCode;
    this.reason = reason;
  }
}

/**
 * Error thrown when the request itself is defective.
 * Never retried, never failed over.
 */
export class InvalidRequestError extends AvatarRelayError {
  readonly issues: readonly string[];
  /** Set when a provider reported the defect rather than local validation */
  readonly provider?: string;
  readonly statusCode?: number;

  constructor(
    issues: readonly string[],
    provider?: string,
    statusCode?: number
  ) {
    const source = provider ? ` (reported by ${provider}, ${statusCode})` : "";
    super("invalid_request", `Invalid request${source}: ${issues.join("; ")}`, false);
    this.name = "InvalidRequestError";
    this.issues = issues;
    this.provider = provider;
    this.statusCode = statusCode;
  }
}

/**
 * Who refused admission
 */
export type RateLimitOrigin = "local" | "provider";

/**
 * Error raised when admission is refused, locally or by the provider (429)
 */
export class RateLimitedError extends AvatarRelayError {
  /** Providers that refused; empty for the façade's capacity error */
  readonly providers: readonly string[];
  readonly origin: RateLimitOrigin;
  /** Time when the limit resets (from Retry-After) */
  readonly resetAt?: Date;

  constructor(
    providers: readonly string[],
    origin: RateLimitOrigin,
    resetAt?: Date
  ) {
    const resetMsg = resetAt ? ` Resets at: ${resetAt.toISOString()}` : "";
    super(
      "rate_limited",
      origin === "local"
        ? `No capacity: admission denied by ${providers.join(", ")}.${resetMsg}`
        : `Rate limited by ${providers.join(", ")}.${resetMsg}`,
      true
    );
    this.name = "RateLimitedError";
    this.providers = providers;
    this.origin = origin;
    this.resetAt = resetAt;
  }
}

/**
 * Final outcome recorded for one provider during a delivery
 */
export interface ProviderAttemptReport {
  readonly provider: string;
  /** Attempts made (0 when admission was denied) */
  readonly attempts: number;
  readonly error: AvatarRelayError;
}

/**
 * Error thrown when every candidate was tried without success
 */
export class AllProvidersExhaustedError extends AvatarRelayError {
  readonly attempts: readonly ProviderAttemptReport[];

  constructor(attempts: readonly ProviderAttemptReport[]) {
    const summary = attempts
      .map((a) => `${a.provider}: ${a.error.kind}`)
      .join(", ");
    super(
      "all_providers_exhausted",
      `All providers exhausted. Attempted: ${summary || "none"}`,
      true
    );
    this.name = "AllProvidersExhaustedError";
    this.attempts = attempts;
  }

  /** Providers that were attempted */
  get attemptedProviders(): string[] {
    return this.attempts.map((a) => a.provider);
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends AvatarRelayError {
  constructor(message: string) {
    super("configuration", `Configuration error: ${message}`, false);
    this.name = "ConfigurationError";
  }
}

/**
 * Narrow an unknown value to a relay error
 */
export const isAvatarRelayError = (error: unknown): error is AvatarRelayError =>
  error instanceof AvatarRelayError;
