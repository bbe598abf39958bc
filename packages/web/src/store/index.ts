/**
 * Store selection
 *
 * Upstash Redis when configured, otherwise process memory (one instance only).
 */

import { MemoryStore, type KeyValueStore, type Logger } from "@sso-bridge/core";
import type { WebConfig } from "../config.js";
import { UpstashStore } from "./upstash.js";

export { UpstashStore } from "./upstash.js";

export interface Stores {
  /** Base store that per-session stores are carved out of */
  sessions: KeyValueStore;
  /** Process-wide provider metadata cache */
  cache: KeyValueStore;
}

export function createStores(config: WebConfig, logger: Logger): Stores {
  if (config.redis) {
    return {
      sessions: UpstashStore.fromConfig(config.redis, "sso:session:"),
      cache: UpstashStore.fromConfig(config.redis, "sso:cache:"),
    };
  }

  logger.warn("Upstash Redis not configured, using in-memory stores");
  return {
    sessions: new MemoryStore(),
    cache: new MemoryStore(),
  };
}
