/**
 * Configuration Loader
 *
 * Loads and validates YAML configuration: the wire formats of the avatar
 * providers and the client file listing providers and policies.
 */

import { parse } from "yaml";
import { readFileSync, readdirSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { isAdapterKind, type AdapterKind, type CredentialRef } from "../types/provider.js";
import type {
  AvatarClientConfig,
  CacheConfig,
  HealthConfig,
  ProbeConfig,
  ProviderConfig,
  RetryConfig,
} from "../types/config.js";
import type {
  AuthYaml,
  ProviderYaml,
  RateLimitYaml,
  WireFieldsYaml,
  WireFormat,
  WireFormatYaml,
} from "./schema.js";

// ============================================================================
// Path Resolution
// ============================================================================

/**
 * Get the config directory path
 */
const getConfigDir = (): string => {
  // In ESM, we need to derive __dirname from import.meta.url
  const currentFile = fileURLToPath(import.meta.url);
  const srcDir = dirname(dirname(currentFile));
  const rootDir = dirname(srcDir);
  return join(rootDir, "config");
};

// ============================================================================
// Validation
// ============================================================================

/**
 * Validation error
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

type RawObject = Record<string, unknown>;

const isRecord = (value: unknown): value is RawObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireRecord = (value: unknown, where: string): RawObject => {
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${where} must be a mapping`);
  }
  return value;
};

const requireString = (obj: RawObject, key: string, where: string): string => {
  const value = obj[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigValidationError(`${where}.${key} must be a non-empty string`);
  }
  return value;
};

const optionalString = (
  obj: RawObject,
  key: string,
  where: string
): string | undefined =>
  obj[key] === undefined || obj[key] === null
    ? undefined
    : requireString(obj, key, where);

const optionalNumber = (
  obj: RawObject,
  key: string,
  where: string,
  min = 0
): number | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
    throw new ConfigValidationError(`${where}.${key} must be a number >= ${min}`);
  }
  return value;
};

const requireNumber = (
  obj: RawObject,
  key: string,
  where: string,
  min = 0
): number => {
  const value = optionalNumber(obj, key, where, min);
  if (value === undefined) {
    throw new ConfigValidationError(`${where}.${key} is required`);
  }
  return value;
};

const optionalBoolean = (
  obj: RawObject,
  key: string,
  where: string
): boolean | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigValidationError(`${where}.${key} must be true or false`);
  }
  return value;
};

const optionalStringList = (
  obj: RawObject,
  key: string,
  where: string
): string[] | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new ConfigValidationError(`${where}.${key} must be a list of strings`);
  }
  return value.map(String);
};

const optionalStringMap = (
  obj: RawObject,
  key: string,
  where: string
): Record<string, string> | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const map = requireRecord(value, `${where}.${key}`);
  return Object.fromEntries(
    Object.keys(map).map((k) => [k, requireString(map, k, `${where}.${key}`)])
  );
};

// ============================================================================
// YAML Parsing
// ============================================================================

/**
 * Parse a YAML file into an unchecked value
 */
const parseYamlFile = (filePath: string): unknown => {
  const content = readFileSync(filePath, "utf-8");
  return parse(content);
};

const readAuth = (value: unknown, where: string): AuthYaml => {
  if (value === undefined || value === null) {
    return { scheme: "none" };
  }
  const auth = requireRecord(value, where);
  const scheme = requireString(auth, "scheme", where);
  switch (scheme) {
    case "bearer":
      return { scheme };
    case "none":
      return { scheme };
    case "header":
      return { scheme, header: requireString(auth, "header", where) };
    default:
      throw new ConfigValidationError(
        `${where}.scheme must be one of bearer, header, none (got "${scheme}")`
      );
  }
};

const readFields = (value: unknown, where: string): WireFieldsYaml => {
  const fields = requireRecord(value, where);
  return {
    text: requireString(fields, "text", where),
    emotion: requireString(fields, "emotion", where),
    language: requireString(fields, "language", where),
    avatar_id: optionalString(fields, "avatar_id", where),
    voice_id: optionalString(fields, "voice_id", where),
    gesture: optionalString(fields, "gesture", where),
  };
};

/**
 * Check the shape of an adapters/*.yml document
 */
export const readWireFormatYaml = (raw: unknown, source: string): WireFormatYaml => {
  const doc = requireRecord(raw, source);
  return {
    name: requireString(doc, "name", source),
    display_name: requireString(doc, "display_name", source),
    speak_path: requireString(doc, "speak_path", source),
    probe_path: requireString(doc, "probe_path", source),
    auth: readAuth(doc["auth"], `${source}.auth`),
    fields: readFields(doc["fields"], `${source}.fields`),
    response_fields: optionalStringList(doc, "response_fields", source) ?? [],
    emotions: optionalStringMap(doc, "emotions", source),
    default_emotion: optionalString(doc, "default_emotion", source),
  };
};

const readRateLimit = (value: unknown, where: string): RateLimitYaml => {
  const limit = requireRecord(value, where);
  return {
    capacity: requireNumber(limit, "capacity", where, 1),
    refill_per_second: requireNumber(limit, "refill_per_second", where),
  };
};

const readProviderYaml = (raw: unknown, where: string): ProviderYaml => {
  const doc = requireRecord(raw, where);
  const credential =
    doc["credential"] === undefined || doc["credential"] === null
      ? undefined
      : requireRecord(doc["credential"], `${where}.credential`);

  return {
    name: requireString(doc, "name", where),
    adapter: optionalString(doc, "adapter", where),
    base_url: requireString(doc, "base_url", where),
    credential: credential && {
      env: optionalString(credential, "env", `${where}.credential`),
      value: optionalString(credential, "value", `${where}.credential`),
    },
    languages: optionalStringList(doc, "languages", where),
    emotions: optionalStringList(doc, "emotions", where),
    priority: optionalNumber(doc, "priority", where, Number.NEGATIVE_INFINITY),
    enabled: optionalBoolean(doc, "enabled", where),
    rate_limit:
      doc["rate_limit"] === undefined || doc["rate_limit"] === null
        ? undefined
        : readRateLimit(doc["rate_limit"], `${where}.rate_limit`),
    timeout_ms: optionalNumber(doc, "timeout_ms", where, 1),
    avatar_id: optionalString(doc, "avatar_id", where),
  };
};

// ============================================================================
// Conversion Functions (YAML -> Runtime types)
// ============================================================================

const toAdapterKind = (value: string, where: string): AdapterKind => {
  if (!isAdapterKind(value)) {
    throw new ConfigValidationError(`${where}: unknown adapter "${value}"`);
  }
  return value;
};

/**
 * Convert a wire format from YAML to runtime format
 */
export const convertWireFormat = (yaml: WireFormatYaml): WireFormat => ({
  name: toAdapterKind(yaml.name, "wire format"),
  displayName: yaml.display_name,
  speakPath: yaml.speak_path,
  probePath: yaml.probe_path,
  auth: yaml.auth,
  fields: {
    text: yaml.fields.text,
    emotion: yaml.fields.emotion,
    language: yaml.fields.language,
    avatarId: yaml.fields.avatar_id,
    voiceId: yaml.fields.voice_id,
    gesture: yaml.fields.gesture,
  },
  responseFields: yaml.response_fields,
  emotions: yaml.emotions,
  defaultEmotion: yaml.default_emotion,
});

const convertCredential = (
  yaml: ProviderYaml["credential"],
  where: string
): CredentialRef | undefined => {
  if (!yaml) {
    return undefined;
  }
  if (yaml.env !== undefined) {
    return { env: yaml.env };
  }
  if (yaml.value !== undefined) {
    return { value: yaml.value };
  }
  throw new ConfigValidationError(`${where}.credential needs "env" or "value"`);
};

/**
 * Convert a provider entry from YAML to runtime format
 */
export const convertProvider = (yaml: ProviderYaml, where: string): ProviderConfig => ({
  name: yaml.name,
  adapter: yaml.adapter === undefined ? undefined : toAdapterKind(yaml.adapter, where),
  baseUrl: yaml.base_url,
  credential: convertCredential(yaml.credential, where),
  languages: yaml.languages,
  emotions: yaml.emotions,
  priority: yaml.priority,
  enabled: yaml.enabled,
  rateLimit: yaml.rate_limit && {
    capacity: yaml.rate_limit.capacity,
    refillPerSecond: yaml.rate_limit.refill_per_second,
  },
  timeoutMs: yaml.timeout_ms,
  avatarId: yaml.avatar_id,
});

const readSection = (doc: RawObject, key: string): RawObject | undefined =>
  doc[key] === undefined || doc[key] === null
    ? undefined
    : requireRecord(doc[key], key);

/**
 * Convert a client document to `AvatarClientConfig`
 */
export const convertClientConfig = (raw: unknown, source: string): AvatarClientConfig => {
  const doc = requireRecord(raw, source);
  const providersRaw = doc["providers"];
  if (!Array.isArray(providersRaw) || providersRaw.length === 0) {
    throw new ConfigValidationError(`${source}.providers must be a non-empty list`);
  }

  const providers = providersRaw.map((entry, i) => {
    const where = `${source}.providers[${i}]`;
    return convertProvider(readProviderYaml(entry, where), where);
  });
  validateUniqueNames(providers.map((p) => p.name), source);

  return {
    providers,
    health: readHealth(doc, source),
    retry: readRetry(doc, source),
    cache: readCache(doc, source),
    probe: readProbe(doc, source),
    attemptTimeoutMs: optionalNumber(doc, "attempt_timeout_ms", source, 1),
    maxTextLength: optionalNumber(doc, "max_text_length", source, 1),
    avatarId: optionalString(doc, "avatar_id", source),
    debug: optionalBoolean(doc, "debug", source),
  };
};

const readHealth = (doc: RawObject, source: string): Partial<HealthConfig> | undefined => {
  const section = readSection(doc, "health");
  if (!section) return undefined;
  const where = `${source}.health`;
  return {
    degradeAfter: optionalNumber(section, "degrade_after", where, 1),
    unhealthyAfter: optionalNumber(section, "unhealthy_after", where, 1),
    recoverAfter: optionalNumber(section, "recover_after", where, 1),
    cooldownBaseMs: optionalNumber(section, "cooldown_base_ms", where),
    cooldownMaxMs: optionalNumber(section, "cooldown_max_ms", where),
    cooldownMultiplier: optionalNumber(section, "cooldown_multiplier", where, 1),
  };
};

const readRetry = (doc: RawObject, source: string): Partial<RetryConfig> | undefined => {
  const section = readSection(doc, "retry");
  if (!section) return undefined;
  const where = `${source}.retry`;
  return {
    maxAttempts: optionalNumber(section, "max_attempts", where, 1),
    baseDelayMs: optionalNumber(section, "base_delay_ms", where),
    maxDelayMs: optionalNumber(section, "max_delay_ms", where),
  };
};

const readCache = (doc: RawObject, source: string): Partial<CacheConfig> | undefined => {
  const section = readSection(doc, "cache");
  if (!section) return undefined;
  const where = `${source}.cache`;
  return {
    enabled: optionalBoolean(section, "enabled", where),
    ttlMs: optionalNumber(section, "ttl_ms", where),
    capacity: optionalNumber(section, "capacity", where),
  };
};

const readProbe = (doc: RawObject, source: string): Partial<ProbeConfig> | undefined => {
  const section = readSection(doc, "probe");
  if (!section) return undefined;
  const where = `${source}.probe`;
  return {
    enabled: optionalBoolean(section, "enabled", where),
    intervalMs: optionalNumber(section, "interval_ms", where, 1),
    jitterRatio: optionalNumber(section, "jitter_ratio", where),
    timeoutMs: optionalNumber(section, "timeout_ms", where, 1),
  };
};

/**
 * Validate that provider names are unique
 */
export const validateUniqueNames = (names: readonly string[], source: string): void => {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ConfigValidationError(
        `${source}: provider "${name}" is defined more than once`
      );
    }
    seen.add(name);
  }
};

// ============================================================================
// Loader Functions
// ============================================================================

/**
 * Load a single wire format from config/adapters/<name>.yml
 */
export const loadWireFormat = (name: string, configDir?: string): WireFormat => {
  const dir = configDir ?? getConfigDir();
  const filePath = join(dir, "adapters", `${name}.yml`);
  return convertWireFormat(readWireFormatYaml(parseYamlFile(filePath), filePath));
};

/**
 * Load all wire formats from config/adapters/
 */
export const loadAllWireFormats = (
  configDir?: string
): Map<AdapterKind, WireFormat> => {
  const dir = configDir ?? getConfigDir();
  const adaptersDir = join(dir, "adapters");
  const files = readdirSync(adaptersDir).filter((f) => f.endsWith(".yml"));

  const formats = new Map<AdapterKind, WireFormat>();

  for (const file of files) {
    const filePath = join(adaptersDir, file);
    const format = convertWireFormat(
      readWireFormatYaml(parseYamlFile(filePath), filePath)
    );
    formats.set(format.name, format);
  }

  return formats;
};

/**
 * Load a client configuration file
 */
export const loadClientConfig = (filePath: string): AvatarClientConfig =>
  convertClientConfig(parseYamlFile(filePath), filePath);

// ============================================================================
// Cached Config (singleton)
// ============================================================================

let cachedWireFormats: Map<AdapterKind, WireFormat> | null = null;

/**
 * Get the bundled wire formats (cached)
 */
export const getWireFormats = (): Map<AdapterKind, WireFormat> => {
  if (!cachedWireFormats) {
    cachedWireFormats = loadAllWireFormats();
  }
  return cachedWireFormats;
};

/**
 * Reset cached configuration (for testing)
 */
export const resetConfigCache = (): void => {
  cachedWireFormats = null;
};
