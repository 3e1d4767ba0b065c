/**
 * Wire formats shipped in config/adapters/*.yml, plus the in-process mock
 */
export type AdapterKind =
  | "duix"
  | "sense-avatar"
  | "akool"
  | "canonical"
  | "mock";

export const ADAPTER_KINDS: readonly AdapterKind[] = [
  "duix",
  "sense-avatar",
  "akool",
  "canonical",
  "mock",
];

export const isAdapterKind = (value: string): value is AdapterKind =>
  (ADAPTER_KINDS as readonly string[]).includes(value);

/**
 * Where a provider's API key comes from
 */
export type CredentialRef = { env: string } | { value: string };

/**
 * What a provider can render. An absent list means "anything".
 */
export interface ProviderCapabilities {
  readonly languages?: readonly string[];
  readonly emotions?: readonly string[];
}

/**
 * Token bucket settings for one provider
 */
export interface RateLimitPolicy {
  /** Maximum burst size */
  readonly capacity: number;
  /** Tokens added per second */
  readonly refillPerSecond: number;
}

/**
 * Identity and connection details of one avatar backend.
 *
 * Descriptors are frozen once loaded. A reload replaces the whole list;
 * nothing mutates a descriptor in place.
 */
export interface ProviderDescriptor {
  /** Unique provider name, used as the key for health and rate state */
  readonly name: string;
  /** Wire format used to talk to this provider */
  readonly adapter: AdapterKind;
  /** Base URL; the wire format's speak/probe paths are appended */
  readonly baseUrl: string;
  readonly credential?: CredentialRef;
  readonly capabilities: ProviderCapabilities;
  /** Lower = preferred. Default: 0 */
  readonly priority: number;
  readonly rateLimit?: RateLimitPolicy;
  /** Per-attempt timeout override in milliseconds */
  readonly timeoutMs?: number;
  /** Avatar to drive when the request does not name one */
  readonly avatarId?: string;
}

const matchesTag = (
  declared: readonly string[] | undefined,
  requested: string
): boolean => {
  if (!declared) {
    return true;
  }
  const normalized = requested.toLowerCase();
  return declared.some((tag) => tag.toLowerCase() === normalized);
};

/**
 * Check whether a provider declares support for a language/emotion pair
 */
export const providerSupports = (
  descriptor: ProviderDescriptor,
  language: string,
  emotion: string
): boolean =>
  matchesTag(descriptor.capabilities.languages, language) &&
  matchesTag(descriptor.capabilities.emotions, emotion);
