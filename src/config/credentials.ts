import type { CredentialRef } from "../types/provider.js";
import { ConfigurationError } from "../types/errors.js";

/**
 * Resolve a provider's API key.
 *
 * Environment references are read on every call so a rotated key is
 * picked up without a reload. Returns undefined when no credential is
 * configured.
 */
export const resolveCredential = (
  provider: string,
  ref: CredentialRef | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined => {
  if (!ref) {
    return undefined;
  }
  if ("value" in ref) {
    return ref.value;
  }
  const value = env[ref.env];
  if (value === undefined || value === "") {
    throw new ConfigurationError(
      `Credential for ${provider} not found: environment variable ${ref.env} is not set`
    );
  }
  return value;
};
