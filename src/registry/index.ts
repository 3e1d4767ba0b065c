export {
  createProviderRegistry,
  buildRegistryState,
  assertUniqueNames,
  type ProviderRegistry,
  type ProviderRegistryDependencies,
  type RegistryState,
} from "./registry.js";
