import { createHash } from "node:crypto";
import type { SpeakPayload } from "../types/request.js";

/**
 * Stable hash of the payload fields that affect what the avatar says.
 *
 * Fields are written in a fixed order and tags are lower-cased, so the
 * same utterance always hashes the same regardless of how the caller built
 * the object. Absent optional fields hash the same as empty ones.
 */
export const fingerprint = (payload: SpeakPayload): string => {
  const canonical = JSON.stringify([
    payload.text,
    payload.emotion.toLowerCase(),
    payload.language.toLowerCase(),
    payload.avatarId ?? "",
    payload.voiceId ?? "",
    payload.gesture ?? "",
  ]);
  return createHash("sha256").update(canonical).digest("hex");
};
