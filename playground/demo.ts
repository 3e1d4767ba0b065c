/**
 * Playground: Avatar Relay Usage & Ergonomics
 *
 * Runs entirely in process against mock providers:
 * - Delivering an utterance
 * - Failover away from a failing provider
 * - Cache hits for repeated utterances
 * - Health snapshot and stats inspection
 *
 * Usage:
 *   npx tsx playground/demo.ts
 *
 * To try real providers, load a file instead:
 *   DUIX_API_KEY=xxx npx tsx playground/demo.ts config/avatar-relay.example.yml
 */

import { createAvatarClient, type AvatarClient } from "../src/client.js";
import { createAdapter, createMockAdapter, type AdapterFactory } from "../src/adapters/index.js";
import { loadClientConfig } from "../src/config/loader.js";
import { ProviderServerError } from "../src/types/errors.js";
import type { AvatarClientConfig } from "../src/types/config.js";
import type { RelayEvent } from "../src/types/events.js";

// ─────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────

const configPath = process.argv[2];

const mockConfig: AvatarClientConfig = {
  providers: [
    { name: "flaky", adapter: "mock", baseUrl: "mock://flaky", priority: 0 },
    { name: "steady", adapter: "mock", baseUrl: "mock://steady", priority: 1 },
  ],
  retry: { maxAttempts: 2, baseDelayMs: 50 },
  probe: { enabled: false },
  avatarId: "commentator-1",
};

// ─────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────

const log = (message: string) => console.log(`\n${message}`);
const divider = () => console.log("─".repeat(60));

const describeEvent = (event: RelayEvent): string => {
  switch (event.type) {
    case "attempt":
      return `attempt ${event.attempt} on ${event.provider}: ${event.outcome}`;
    case "health_transition":
      return `${event.provider}: ${event.from} -> ${event.to}`;
    case "delivered":
      return `delivered by ${event.provider} in ${event.latencyMs}ms`;
    default:
      return event.type;
  }
};

/**
 * Mock adapters, with "flaky" answering 503 to everything
 */
const demoAdapters: AdapterFactory = (descriptor, context) => {
  const mock = createMockAdapter({ descriptor, latencyMs: 80, avatarId: context.avatarId });
  if (descriptor.name !== "flaky") {
    return mock;
  }
  return {
    ...mock,
    speak: async () => {
      throw new ProviderServerError(descriptor.name, 503, "maintenance");
    },
  };
};

// ─────────────────────────────────────────────────────────────────
// Demos
// ─────────────────────────────────────────────────────────────────

const demoDelivery = async (client: AvatarClient) => {
  log("📌 Delivery with failover");
  divider();

  const result = await client.speak({ text: "What a strike!", emotion: "excited" });
  console.log(`Provider: ${result.providerUsed}`);
  console.log(`Fields: ${JSON.stringify(result.response.fields)}`);
  console.log(`Latency: ${result.latencyMs}ms, attempts: ${result.attempts}`);
};

const demoCache = async (client: AvatarClient) => {
  log("📌 Repeated utterance");
  divider();

  const result = await client.speak({ text: "What a strike!", emotion: "excited" });
  console.log(`Cached: ${result.cached}, provider: ${result.providerUsed}`);
};

const demoHealth = (client: AvatarClient) => {
  log("📌 Health and stats");
  divider();

  for (const [name, health] of Object.entries(client.getHealthSnapshot())) {
    console.log(
      `${name}: ${health.state} (failures: ${health.consecutiveFailures}, successes: ${health.consecutiveSuccesses})`
    );
  }
  console.log(`Deliveries: ${JSON.stringify(client.getStats().deliveries)}`);
};

// ─────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────

const main = async () => {
  const config = configPath ? loadClientConfig(configPath) : mockConfig;
  const client = createAvatarClient(
    { ...config, onEvent: (event) => console.log(`  · ${describeEvent(event)}`) },
    { createAdapter: configPath ? createAdapter : demoAdapters }
  );

  try {
    await demoDelivery(client);
    await demoCache(client);
    demoHealth(client);
  } finally {
    await client.close();
  }
};

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
