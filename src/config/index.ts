/**
 * Configuration Module
 *
 * Exports configuration types and loader functions.
 */

// Schema types
export type {
  AuthYaml,
  WireFieldsYaml,
  WireFormatYaml,
  RateLimitYaml,
  ProviderYaml,
  WireFormat,
} from "./schema.js";

// Loader functions
export {
  readWireFormatYaml,
  convertWireFormat,
  convertProvider,
  convertClientConfig,
  validateUniqueNames,
  loadWireFormat,
  loadAllWireFormats,
  loadClientConfig,
  getWireFormats,
  resetConfigCache,
  ConfigValidationError,
} from "./loader.js";

export { resolveCredential } from "./credentials.js";
