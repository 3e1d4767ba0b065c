/**
 * Provider Selection Module
 *
 * Orders the providers able to serve a payload: capability filter, then
 * health tier, then static priority, then round-robin among equals. An
 * unhealthy provider whose cooldown has elapsed is appended once as a
 * canary.
 */

import { ok, err, type Result } from "neverthrow";
import { HEALTH_TIER, type HealthState } from "../types/health.js";
import { providerSupports } from "../types/provider.js";
import type { SpeakPayload } from "../types/request.js";
import { debug } from "../utils/debug.js";
import type {
  Candidate,
  RegisteredProvider,
  SelectionDependencies,
  SelectionError,
} from "./types.js";

/**
 * Produces ordered candidate lists
 */
export interface Selector {
  /**
   * Ordered candidates for a payload. At most one canary is included, and
   * its slot stays claimed until the health monitor records an outcome
   * for it or the caller releases it.
   */
  candidates(payload: SpeakPayload): Result<Candidate[], SelectionError>;
}

/**
 * Keep providers that declare the payload's language and emotion
 */
export const filterCapable = (
  providers: readonly RegisteredProvider[],
  payload: Pick<SpeakPayload, "language" | "emotion">
): RegisteredProvider[] =>
  providers.filter(({ descriptor }) =>
    providerSupports(descriptor, payload.language, payload.emotion)
  );

/**
 * Rotate an array left by `offset`
 */
const rotate = <T>(items: readonly T[], offset: number): T[] => {
  if (items.length < 2) {
    return [...items];
  }
  const shift = offset % items.length;
  return [...items.slice(shift), ...items.slice(0, shift)];
};

/**
 * Sort by tier then priority, rotating each group of equals by `turn`
 */
export const orderByTierAndPriority = (
  entries: ReadonlyArray<{ provider: RegisteredProvider; state: HealthState }>,
  turn: number
): Array<{ provider: RegisteredProvider; state: HealthState }> => {
  const groups = new Map<string, Array<{ provider: RegisteredProvider; state: HealthState }>>();

  const sorted = [...entries].sort(
    (a, b) =>
      HEALTH_TIER[a.state] - HEALTH_TIER[b.state] ||
      a.provider.descriptor.priority - b.provider.descriptor.priority
  );

  for (const entry of sorted) {
    const key = `${entry.state}:${entry.provider.descriptor.priority}`;
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  // Map keeps insertion order, which is the sorted order of the groups
  return [...groups.values()].flatMap((group) => rotate(group, turn));
};

/**
 * Create a selector over the registry's current providers
 */
export const createSelector = (deps: SelectionDependencies): Selector => {
  const { providers, monitor, now = Date.now } = deps;
  let turn = 0;

  const candidates = (payload: SpeakPayload): Result<Candidate[], SelectionError> => {
    const capable = filterCapable(providers(), payload);
    if (capable.length === 0) {
      debug.log(
        `No provider supports language "${payload.language}" with emotion "${payload.emotion}"`
      );
      return err({
        type: "no_capable_providers",
        language: payload.language,
        emotion: payload.emotion,
      });
    }

    const inRotation: Array<{ provider: RegisteredProvider; state: HealthState }> = [];
    const cooling: RegisteredProvider[] = [];

    for (const provider of capable) {
      const state = monitor.stateOf(provider.descriptor.name) ?? "healthy";
      if (state === "unhealthy") {
        cooling.push(provider);
      } else {
        inRotation.push({ provider, state });
      }
    }

    const ordered: Candidate[] = orderByTierAndPriority(inRotation, turn).map(
      ({ provider, state }) => ({ provider, state, canary: false })
    );
    turn++;

    const at = now();
    const canary = [...cooling]
      .sort((a, b) => a.descriptor.priority - b.descriptor.priority)
      .find((p) => monitor.claimCanary(p.descriptor.name, at));

    if (canary) {
      debug.log(`Offering ${canary.descriptor.name} as canary`);
      ordered.push({ provider: canary, state: "unhealthy", canary: true });
    }

    if (ordered.length === 0) {
      return err({
        type: "no_available_providers",
        unavailable: cooling.map((p) => p.descriptor.name),
      });
    }

    debug.log(
      "Candidates:",
      ordered.map((c) => `${c.provider.descriptor.name}(${c.state})`)
    );
    return ok(ordered);
  };

  return { candidates };
};
