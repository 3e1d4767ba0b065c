/**
 * Wire Format Helpers
 *
 * Translate a canonical payload into a provider's request body and
 * headers, and pick the interesting fields out of its response.
 */

import type { WireFormat } from "../config/schema.js";
import type { SpeakPayload } from "../types/request.js";

/**
 * Translate an emotion tag through the format's table.
 * Formats without a table receive the tag unchanged.
 */
export const translateEmotion = (format: WireFormat, emotion: string): string => {
  if (!format.emotions) {
    return emotion;
  }
  const key = emotion.toLowerCase();
  return format.emotions[key] ?? format.defaultEmotion ?? key;
};

/**
 * Build the JSON body for a speak call.
 *
 * Optional fields are only sent when the format names a field for them
 * and a value is known. The avatar falls back to `fallbackAvatarId`.
 */
export const buildSpeakBody = (
  format: WireFormat,
  payload: SpeakPayload,
  fallbackAvatarId?: string
): Record<string, string> => {
  const { fields } = format;
  const body: Record<string, string> = {
    [fields.text]: payload.text,
    [fields.emotion]: translateEmotion(format, payload.emotion),
    [fields.language]: payload.language,
  };

  const avatarId = payload.avatarId ?? fallbackAvatarId;
  if (fields.avatarId && avatarId !== undefined) {
    body[fields.avatarId] = avatarId;
  }
  if (fields.voiceId && payload.voiceId !== undefined) {
    body[fields.voiceId] = payload.voiceId;
  }
  if (fields.gesture && payload.gesture !== undefined) {
    body[fields.gesture] = payload.gesture;
  }

  return body;
};

/**
 * Create request headers, including authentication when a key is given
 */
export const buildHeaders = (
  format: WireFormat,
  apiKey: string | undefined
): Record<string, string> => {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json",
  };
  if (apiKey === undefined) {
    return headers;
  }
  switch (format.auth.scheme) {
    case "bearer":
      headers["Authorization"] = `Bearer ${apiKey}`;
      break;
    case "header":
      headers[format.auth.header] = apiKey;
      break;
    case "none":
      break;
  }
  return headers;
};

/**
 * Lift the configured top-level response fields out of a parsed body
 */
export const liftResponseFields = (
  format: WireFormat,
  body: unknown
): Record<string, string> => {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  const lifted: Record<string, string> = {};
  for (const field of format.responseFields) {
    const value: unknown = Reflect.get(body, field);
    if (typeof value === "string" || typeof value === "number") {
      lifted[field] = String(value);
    }
  }
  return lifted;
};
