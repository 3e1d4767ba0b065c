import { describe, it, expect } from "vitest";
import {
  buildHeaders,
  buildSpeakBody,
  liftResponseFields,
  translateEmotion,
} from "./wire.js";
import type { WireFormat } from "../config/schema.js";
import type { SpeakPayload } from "../types/request.js";

const duix: WireFormat = {
  name: "duix",
  displayName: "DUIX",
  speakPath: "/v1/avatar/speak",
  probePath: "/v1/health",
  auth: { scheme: "bearer" },
  fields: {
    text: "text",
    emotion: "emotion",
    language: "language",
    avatarId: "avatar_id",
    voiceId: "voice_id",
  },
  responseFields: ["avatar_url", "audio_url"],
  emotions: { neutral: "neutral", happy: "joy" },
  defaultEmotion: "neutral",
};

const canonical: WireFormat = {
  name: "canonical",
  displayName: "Canonical",
  speakPath: "/speak",
  probePath: "/health",
  auth: { scheme: "none" },
  fields: { text: "text", emotion: "emotion", language: "language" },
  responseFields: [],
};

const payload: SpeakPayload = {
  text: "Goal!",
  emotion: "happy",
  language: "en",
};

describe("wire", () => {
  // ─────────────────────────────────────────────────────────────────
  // Emotion translation
  // ─────────────────────────────────────────────────────────────────

  describe("translateEmotion", () => {
    it("maps through the table, ignoring case", () => {
      expect(translateEmotion(duix, "Happy")).toBe("joy");
    });

    it("falls back to the default emotion for unknown tags", () => {
      expect(translateEmotion(duix, "bewildered")).toBe("neutral");
    });

    it("passes tags through when the format has no table", () => {
      expect(translateEmotion(canonical, "Happy")).toBe("Happy");
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Body
  // ─────────────────────────────────────────────────────────────────

  describe("buildSpeakBody", () => {
    it("produces the canonical three-field body", () => {
      expect(buildSpeakBody(canonical, { ...payload, avatarId: "a1" })).toEqual({
        text: "Goal!",
        emotion: "happy",
        language: "en",
      });
    });

    it("renames fields and prefers the request avatar over the fallback", () => {
      const body = buildSpeakBody(
        duix,
        { ...payload, avatarId: "req-avatar", voiceId: "v2" },
        "fallback"
      );
      expect(body).toEqual({
        text: "Goal!",
        emotion: "joy",
        language: "en",
        avatar_id: "req-avatar",
        voice_id: "v2",
      });
    });

    it("uses the fallback avatar when the request names none", () => {
      expect(buildSpeakBody(duix, payload, "fallback")["avatar_id"]).toBe("fallback");
    });

    it("omits fields the format has no name for", () => {
      const body = buildSpeakBody(duix, { ...payload, gesture: "wave" });
      expect(body).not.toHaveProperty("gesture");
      expect(body).not.toHaveProperty("avatar_id");
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Headers
  // ─────────────────────────────────────────────────────────────────

  describe("buildHeaders", () => {
    it("sends a bearer token", () => {
      expect(buildHeaders(duix, "test-secret")["Authorization"]).toBe(
        "Bearer test-secret"
      );
    });

    it("sends the key in a named header", () => {
      const format: WireFormat = {
        ...duix,
        auth: { scheme: "header", header: "X-API-Key" },
      };
      const headers = buildHeaders(format, "test-secret");
      expect(headers["X-API-Key"]).toBe("test-secret");
      expect(headers["Authorization"]).toBeUndefined();
    });

    it("sends no auth header without a key", () => {
      expect(buildHeaders(duix, undefined)).toEqual({
        "Content-Type": "application/json",
        Accept: "application/json",
      });
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Response fields
  // ─────────────────────────────────────────────────────────────────

  describe("liftResponseFields", () => {
    it("lifts string and number fields", () => {
      expect(
        liftResponseFields(duix, {
          avatar_url: "https://cdn.test/a.mp4",
          audio_url: 42,
          other: "ignored",
        })
      ).toEqual({ avatar_url: "https://cdn.test/a.mp4", audio_url: "42" });
    });

    it("returns nothing for non-object bodies", () => {
      expect(liftResponseFields(duix, "plain text")).toEqual({});
      expect(liftResponseFields(duix, null)).toEqual({});
    });
  });
});
