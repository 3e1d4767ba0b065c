/**
 * Adapters Module
 *
 * One uniform SpeakAdapter per provider, chosen by the descriptor's
 * `adapter` key.
 */

import type { WireFormat } from "../config/schema.js";
import { ConfigurationError } from "../types/errors.js";
import type { AdapterKind, ProviderDescriptor } from "../types/provider.js";
import { createHttpAdapter } from "./http-adapter.js";
import { createMockAdapter } from "./mock.js";
import type { SpeakAdapter } from "./types.js";

export type { AttemptOptions, SpeakAdapter } from "./types.js";
export { createHttpAdapter, type HttpAdapterOptions } from "./http-adapter.js";
export { createMockAdapter, type MockAdapterOptions } from "./mock.js";
export { sendRequest, errorForStatus, parseRetryAfter } from "./http.js";
export type { HttpRequest, HttpResponse } from "./http.js";
export {
  buildSpeakBody,
  buildHeaders,
  translateEmotion,
  liftResponseFields,
} from "./wire.js";

/**
 * Shared settings for building adapters
 */
export interface AdapterContext {
  formats: ReadonlyMap<AdapterKind, WireFormat>;
  attemptTimeoutMs: number;
  avatarId?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Factory for adapters; injectable so tests can swap in fakes
 */
export type AdapterFactory = (
  descriptor: ProviderDescriptor,
  context: AdapterContext
) => SpeakAdapter;

/**
 * Create the adapter named by a descriptor's metadata
 */
export const createAdapter: AdapterFactory = (descriptor, context) => {
  if (descriptor.adapter === "mock") {
    return createMockAdapter({ descriptor, avatarId: context.avatarId });
  }

  const format = context.formats.get(descriptor.adapter);
  if (!format) {
    throw new ConfigurationError(
      `No wire format "${descriptor.adapter}" for provider ${descriptor.name}`
    );
  }

  return createHttpAdapter({
    descriptor,
    format,
    attemptTimeoutMs: context.attemptTimeoutMs,
    avatarId: context.avatarId,
    env: context.env,
  });
};
