/**
 * avatar-relay
 *
 * A TypeScript library that delivers avatar speak requests to one of several
 * interchangeable providers, with health tracking, failover, response
 * caching and per-provider admission control.
 */

export const VERSION = "0.1.0";

// Client
export {
  createAvatarClient,
  type AvatarClient,
  type AvatarClientOptions,
  type ClientStats,
} from "./client.js";

// Input validation
export {
  validateSpeakInput,
  DEFAULT_EMOTION,
  DEFAULT_LANGUAGE,
  type ValidatedInput,
} from "./validation.js";

// Export all types
export * from "./types/index.js";

// Export configuration loading
export * from "./config/index.js";

// Export adapters
export * from "./adapters/index.js";

// Export health tracking
export * from "./health/index.js";

// Export rate limit tracking
export * from "./rate-limit/index.js";

// Export response cache
export * from "./cache/index.js";

// Export routing
export * from "./routing/index.js";

// Export provider registry
export * from "./registry/index.js";

// Export debug logging
export { debug, setDebugEnabled, isDebugEnabled, type DebugLogger } from "./utils/index.js";
