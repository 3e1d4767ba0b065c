/**
 * Request Validation
 *
 * Checks a caller's input before any provider is contacted. All problems
 * are collected into one InvalidRequestError.
 */

import { ok, err, type Result } from "neverthrow";
import { InvalidRequestError } from "./types/errors.js";
import type { SpeakInput, SpeakPayload } from "./types/request.js";

export const DEFAULT_EMOTION = "neutral";
export const DEFAULT_LANGUAGE = "en";

const TAG_PATTERN = /^[a-z][a-z0-9_-]*$/;

/**
 * A payload ready for fingerprinting, with its absolute deadline
 */
export interface ValidatedInput {
  payload: SpeakPayload;
  deadline?: number;
}

const checkTag = (
  issues: string[],
  field: string,
  value: unknown,
  fallback: string
): string => {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    issues.push(`${field} must be a string`);
    return fallback;
  }
  const tag = value.trim().toLowerCase();
  if (!TAG_PATTERN.test(tag)) {
    issues.push(`${field} "${value}" is not a valid tag`);
  }
  return tag;
};

const checkOptionalId = (
  issues: string[],
  field: string,
  value: unknown
): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    issues.push(`${field} must be a non-empty string`);
    return undefined;
  }
  return value;
};

const checkDeadline = (
  issues: string[],
  input: SpeakInput,
  now: number
): number | undefined => {
  const { deadline, timeoutMs } = input;

  if (deadline !== undefined && !Number.isFinite(deadline)) {
    issues.push("deadline must be a finite epoch timestamp");
  }
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    issues.push("timeoutMs must be a positive number");
  }

  const fromTimeout =
    timeoutMs !== undefined && Number.isFinite(timeoutMs) ? now + timeoutMs : undefined;
  const absolute = deadline !== undefined && Number.isFinite(deadline) ? deadline : undefined;

  if (fromTimeout !== undefined && absolute !== undefined) {
    return Math.min(fromTimeout, absolute);
  }
  return fromTimeout ?? absolute;
};

/**
 * Validate caller input and apply defaults
 */
export const validateSpeakInput = (
  input: SpeakInput,
  maxTextLength: number,
  now: number = Date.now()
): Result<ValidatedInput, InvalidRequestError> => {
  const issues: string[] = [];

  const text: unknown = input.text;
  if (typeof text !== "string" || text.trim() === "") {
    issues.push("text must be a non-empty string");
  } else if (text.length > maxTextLength) {
    issues.push(`text is ${text.length} characters, the limit is ${maxTextLength}`);
  }

  const emotion = checkTag(issues, "emotion", input.emotion, DEFAULT_EMOTION);
  const language = checkTag(issues, "language", input.language, DEFAULT_LANGUAGE);
  const avatarId = checkOptionalId(issues, "avatarId", input.avatarId);
  const voiceId = checkOptionalId(issues, "voiceId", input.voiceId);
  const gesture = checkOptionalId(issues, "gesture", input.gesture);
  const deadline = checkDeadline(issues, input, now);

  if (issues.length > 0 || typeof text !== "string") {
    return err(new InvalidRequestError(issues));
  }

  return ok({
    payload: { text, emotion, language, avatarId, voiceId, gesture },
    deadline,
  });
};
