import type { WireFormat } from "../config/schema.js";
import { resolveCredential } from "../config/credentials.js";
import type { ProviderDescriptor } from "../types/provider.js";
import type { SpeakPayload, SpeakResponse } from "../types/request.js";
import { debug } from "../utils/debug.js";
import type { AttemptOptions, SpeakAdapter } from "./types.js";
import { sendRequest } from "./http.js";
import { buildHeaders, buildSpeakBody, liftResponseFields } from "./wire.js";

/**
 * Options for an HTTP-backed adapter
 */
export interface HttpAdapterOptions {
  descriptor: ProviderDescriptor;
  format: WireFormat;
  /** Used when the descriptor has no `timeoutMs` */
  attemptTimeoutMs: number;
  /** Client-wide avatar, after the request's and the descriptor's */
  avatarId?: string;
  /** Environment used to resolve `{ env }` credentials */
  env?: NodeJS.ProcessEnv;
}

/**
 * Create an adapter that talks to a provider over HTTP using its wire format
 */
export const createHttpAdapter = (options: HttpAdapterOptions): SpeakAdapter => {
  const { descriptor, format, attemptTimeoutMs, env } = options;
  const provider = descriptor.name;
  const fallbackAvatarId = descriptor.avatarId ?? options.avatarId;

  const headers = (): Record<string, string> =>
    buildHeaders(format, resolveCredential(provider, descriptor.credential, env));

  const speak = async (
    payload: SpeakPayload,
    attempt: AttemptOptions = {}
  ): Promise<SpeakResponse> => {
    const url = `${descriptor.baseUrl}${format.speakPath}`;
    debug.log(`POST ${url} (${format.displayName})`);

    const response = await sendRequest({
      provider,
      url,
      method: "POST",
      headers: headers(),
      body: buildSpeakBody(format, payload, fallbackAvatarId),
      timeoutMs: attempt.timeoutMs ?? descriptor.timeoutMs ?? attemptTimeoutMs,
      signal: attempt.signal,
    });

    return {
      status: response.status,
      body: response.body,
      fields: liftResponseFields(format, response.body),
    };
  };

  const probe = async (attempt: AttemptOptions = {}): Promise<void> => {
    await sendRequest({
      provider,
      url: `${descriptor.baseUrl}${format.probePath}`,
      method: "GET",
      headers: headers(),
      timeoutMs: attempt.timeoutMs ?? descriptor.timeoutMs ?? attemptTimeoutMs,
      signal: attempt.signal,
    });
  };

  return {
    provider,
    kind: format.name,
    speak,
    probe,
  };
};
