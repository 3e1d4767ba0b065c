/**
 * Provider Registry
 *
 * Holds the live providers and their adapters. A reload builds a complete
 * new state and swaps it in one assignment, so a delivery that already
 * picked its candidates keeps using the descriptors it saw.
 */

import {
  createAdapter as defaultCreateAdapter,
  type AdapterContext,
  type AdapterFactory,
} from "../adapters/index.js";
import type { HealthMonitor } from "../health/monitor.js";
import type { RateLimiter } from "../rate-limit/limiter.js";
import type { RegisteredProvider } from "../routing/types.js";
import { ConfigurationError } from "../types/errors.js";
import type { ProviderDescriptor } from "../types/provider.js";
import { debug } from "../utils/debug.js";

/**
 * Immutable registry state
 */
export type RegistryState = Readonly<{
  providers: readonly RegisteredProvider[];
  byName: ReadonlyMap<string, RegisteredProvider>;
}>;

/**
 * Dependencies of the registry
 */
export interface ProviderRegistryDependencies {
  monitor: HealthMonitor;
  limiter: RateLimiter;
  adapterContext: AdapterContext;
  /** Default: adapters/createAdapter */
  createAdapter?: AdapterFactory;
}

export interface ProviderRegistry {
  /** Current providers in configuration order */
  list(): readonly RegisteredProvider[];
  get(name: string): RegisteredProvider | undefined;
  names(): string[];
  /**
   * Replace every descriptor. Health and rate state carry over for names
   * that survive; new names start fresh; removed names are dropped.
   */
  reload(descriptors: readonly ProviderDescriptor[]): void;
}

/**
 * Throw if two descriptors share a name
 */
export const assertUniqueNames = (descriptors: readonly ProviderDescriptor[]): void => {
  const seen = new Set<string>();
  for (const { name } of descriptors) {
    if (seen.has(name)) {
      throw new ConfigurationError(`Provider "${name}" is configured more than once`);
    }
    seen.add(name);
  }
};

/**
 * Build registry state from descriptors
 */
export const buildRegistryState = (
  descriptors: readonly ProviderDescriptor[],
  context: AdapterContext,
  createAdapter: AdapterFactory
): RegistryState => {
  assertUniqueNames(descriptors);

  const providers = descriptors.map((descriptor) =>
    Object.freeze({
      descriptor: Object.isFrozen(descriptor) ? descriptor : Object.freeze({ ...descriptor }),
      adapter: createAdapter(descriptor, context),
    })
  );

  return Object.freeze({
    providers: Object.freeze(providers),
    byName: new Map(providers.map((p) => [p.descriptor.name, p])),
  });
};

/**
 * Create a provider registry
 */
export const createProviderRegistry = (
  descriptors: readonly ProviderDescriptor[],
  deps: ProviderRegistryDependencies
): ProviderRegistry => {
  const { monitor, limiter, adapterContext } = deps;
  const createAdapter = deps.createAdapter ?? defaultCreateAdapter;

  let state = buildRegistryState(descriptors, adapterContext, createAdapter);
  monitor.reconcile(descriptors.map((d) => d.name));
  limiter.reconcile(descriptors);

  const reload = (next: readonly ProviderDescriptor[]): void => {
    // Build first so a bad list leaves the current state untouched
    const nextState = buildRegistryState(next, adapterContext, createAdapter);
    state = nextState;
    monitor.reconcile(next.map((d) => d.name));
    limiter.reconcile(next);
    debug.log(`Registry reloaded: ${next.map((d) => d.name).join(", ") || "(empty)"}`);
  };

  return {
    list: () => state.providers,
    get: (name) => state.byName.get(name),
    names: () => state.providers.map((p) => p.descriptor.name),
    reload,
  };
};
