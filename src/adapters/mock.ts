import type { ProviderDescriptor } from "../types/provider.js";
import type { SpeakPayload, SpeakResponse } from "../types/request.js";
import { AvatarRelayError, TimeoutError } from "../types/errors.js";
import { sleep } from "../utils/sleep.js";
import type { AttemptOptions, SpeakAdapter } from "./types.js";

/**
 * Options for the in-process mock provider
 */
export interface MockAdapterOptions {
  descriptor: ProviderDescriptor;
  /** Simulated network delay. Default: 100 */
  latencyMs?: number;
  /** Client-wide avatar, after the request's and the descriptor's */
  avatarId?: string;
}

/**
 * Create an adapter that answers in process without any network traffic.
 * Useful for demos and for running the client without credentials.
 */
export const createMockAdapter = (options: MockAdapterOptions): SpeakAdapter => {
  const { descriptor, latencyMs = 100 } = options;
  const fallbackAvatarId = descriptor.avatarId ?? options.avatarId ?? "default";

  const wait = async (ms: number, signal?: AbortSignal): Promise<void> => {
    try {
      await sleep(ms, signal);
    } catch (error) {
      throw error instanceof AvatarRelayError
        ? error
        : new TimeoutError("caller", descriptor.name);
    }
  };

  const speak = async (
    payload: SpeakPayload,
    attempt: AttemptOptions = {}
  ): Promise<SpeakResponse> => {
    await wait(latencyMs, attempt.signal);
    const avatarId = payload.avatarId ?? fallbackAvatarId;
    const videoUrl = `https://mock.avatar.local/video/${encodeURIComponent(avatarId)}`;

    return {
      status: 200,
      body: {
        status: "success",
        data: {
          text: payload.text,
          emotion: payload.emotion,
          language: payload.language,
          avatar_id: avatarId,
        },
        message: "Mock avatar service processed the request",
        video_url: videoUrl,
      },
      fields: { video_url: videoUrl },
    };
  };

  const probe = async (attempt: AttemptOptions = {}): Promise<void> => {
    await wait(0, attempt.signal);
  };

  return {
    provider: descriptor.name,
    kind: "mock",
    speak,
    probe,
  };
};
