/**
 * Cache Module
 */

export {
  createResponseCache,
  type ResponseCache,
  type ResponseCacheConfig,
  type CacheEntry,
} from "./response-cache.js";

export { fingerprint } from "./fingerprint.js";
