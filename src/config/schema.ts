/**
 * Configuration Schema Types
 *
 * TypeScript types representing the YAML configuration structure.
 * These types are used for parsing and validating config files.
 */

import type { AdapterKind } from "../types/provider.js";

// ============================================================================
// Wire formats (config/adapters/*.yml)
// ============================================================================

/**
 * How the API key is sent
 */
export type AuthYaml =
  | { scheme: "bearer" }
  | { scheme: "header"; header: string }
  | { scheme: "none" };

/**
 * Request field names, keyed by canonical payload field
 */
export interface WireFieldsYaml {
  text: string;
  emotion: string;
  language: string;
  avatar_id?: string;
  voice_id?: string;
  gesture?: string;
}

/**
 * Root structure of adapters/*.yml
 */
export interface WireFormatYaml {
  /** Adapter key (e.g., "duix") */
  name: string;
  /** Human-readable name */
  display_name: string;
  speak_path: string;
  probe_path: string;
  auth: AuthYaml;
  fields: WireFieldsYaml;
  /** Top-level response fields lifted into SpeakResponse.fields */
  response_fields: string[];
  /** Emotion tag translation; absent means tags are sent as is */
  emotions?: Record<string, string>;
  /** Tag sent for emotions missing from `emotions` */
  default_emotion?: string;
}

// ============================================================================
// Client file (e.g. config/avatar-relay.example.yml)
// ============================================================================

export interface RateLimitYaml {
  capacity: number;
  refill_per_second: number;
}

export interface ProviderYaml {
  name: string;
  adapter?: string;
  base_url: string;
  credential?: { env?: string; value?: string };
  languages?: string[];
  emotions?: string[];
  priority?: number;
  enabled?: boolean;
  rate_limit?: RateLimitYaml;
  timeout_ms?: number;
  avatar_id?: string;
}

// ============================================================================
// Loaded Config (after parsing and conversion)
// ============================================================================

/**
 * Parsed wire format (camelCase)
 */
export interface WireFormat {
  name: AdapterKind;
  displayName: string;
  speakPath: string;
  probePath: string;
  auth: AuthYaml;
  fields: {
    text: string;
    emotion: string;
    language: string;
    avatarId?: string;
    voiceId?: string;
    gesture?: string;
  };
  responseFields: string[];
  emotions?: Readonly<Record<string, string>>;
  defaultEmotion?: string;
}
