import {
  AvatarRelayError,
  InvalidRequestError,
  ProviderRejectedError,
  ProviderServerError,
  RateLimitedError,
  TimeoutError,
  TransportError,
} from "../types/errors.js";

/**
 * A single HTTP exchange with a provider
 */
export interface HttpRequest {
  /** Provider name, used in errors */
  provider: string;
  url: string;
  method: "GET" | "POST";
  headers: Record<string, string>;
  /** JSON-serialized when present */
  body?: unknown;
  /** Attempt timeout in milliseconds */
  timeoutMs: number;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * Status and decoded body of a 2xx response
 */
export interface HttpResponse {
  status: number;
  /** Parsed JSON, or the raw text when the body is not JSON */
  body: unknown;
}

/**
 * Parse Retry-After header value
 */
export const parseRetryAfter = (
  value: string | null,
  now = Date.now()
): number | undefined => {
  if (!value) return undefined;

  // Try parsing as seconds
  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) return Math.max(0, seconds);

  // Try parsing as HTTP date
  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const secondsUntil = Math.ceil((date.getTime() - now) / 1000);
    return Math.max(0, secondsUntil);
  }

  return undefined;
};

const decodeBody = (text: string): unknown => {
  if (text === "") {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

/**
 * Map a non-2xx response to the error taxonomy
 */
export const errorForStatus = (
  provider: string,
  status: number,
  bodyText: string,
  retryAfter: string | null,
  now = Date.now()
): AvatarRelayError => {
  if (status === 400 || status === 401 || status === 403) {
    const reason = bodyText.trim() || `HTTP ${status}`;
    return new InvalidRequestError([reason], provider, status);
  }
  if (status === 408) {
    return new TimeoutError("provider", provider);
  }
  if (status === 429) {
    const seconds = parseRetryAfter(retryAfter, now);
    const resetAt = seconds !== undefined ? new Date(now + seconds * 1000) : undefined;
    return new RateLimitedError([provider], "provider", resetAt);
  }
  if (status >= 500) {
    return new ProviderServerError(provider, status, bodyText || undefined);
  }
  return new ProviderRejectedError(provider, status, bodyText.trim() || `HTTP ${status}`);
};

/**
 * Send one request with an attempt timeout linked to the caller's signal.
 *
 * Rejects with a relay error only: the attempt timer yields a provider
 * TimeoutError, a caller abort yields a caller TimeoutError (or whatever
 * relay error the signal was aborted with).
 */
export const sendRequest = async (request: HttpRequest): Promise<HttpResponse> => {
  const { provider, url, method, headers, body, timeoutMs, signal } = request;

  const controller = new AbortController();
  const abortFromCaller = (): void => {
    controller.abort(
      signal?.reason instanceof AvatarRelayError
        ? signal.reason
        : new TimeoutError("caller", provider)
    );
  };

  if (signal?.aborted) {
    abortFromCaller();
  } else {
    signal?.addEventListener("abort", abortFromCaller, { once: true });
  }
  const timeoutId = setTimeout(
    () => controller.abort(new TimeoutError("provider", provider, timeoutMs)),
    timeoutMs
  );

  try {
    if (controller.signal.aborted) {
      throw controller.signal.reason;
    }

    const response = await fetch(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });

    const text = await response.text();

    if (!response.ok) {
      throw errorForStatus(
        provider,
        response.status,
        text,
        response.headers.get("Retry-After")
      );
    }

    return { status: response.status, body: decodeBody(text) };
  } catch (error) {
    if (error instanceof AvatarRelayError) {
      throw error;
    }

    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && reason instanceof AvatarRelayError) {
      throw reason;
    }

    throw new TransportError(
      provider,
      error instanceof Error ? error.message : "Unknown",
      { cause: error }
    );
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", abortFromCaller);
  }
};
