/**
 * Upstash Redis store implementation
 *
 * Backs both the session-scoped store and the process-wide cache when the
 * adapter runs on more than one instance.
 */

import { Redis } from "@upstash/redis";
import type { KeyValueStore } from "@sso-bridge/core";
import type { RedisConfig } from "../config.js";

export class UpstashStore implements KeyValueStore {
  private redis: Redis;

  constructor(redis: Redis, private readonly keyPrefix: string = "sso:") {
    this.redis = redis;
  }

  static fromConfig(config: RedisConfig, keyPrefix?: string): UpstashStore {
    // Values are opaque strings; keep the client from JSON-decoding them
    const redis = new Redis({
      url: config.url,
      token: config.token,
      automaticDeserialization: false,
    });
    return new UpstashStore(redis, keyPrefix);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get<string>(this.keyPrefix + key);
  }

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds === undefined) {
      await this.redis.set(this.keyPrefix + key, value);
    } else {
      await this.redis.set(this.keyPrefix + key, value, { ex: ttlSeconds });
    }
  }

  async forget(key: string): Promise<void> {
    await this.redis.del(this.keyPrefix + key);
  }

  /**
   * GETDEL: a single atomic command, so one-time entries cannot be read twice
   */
  async take(key: string): Promise<string | null> {
    return this.redis.getdel<string>(this.keyPrefix + key);
  }

  async keys(prefix: string): Promise<string[]> {
    const keys = await this.redis.keys(`${this.keyPrefix}${escapeGlob(prefix)}*`);
    return keys.map((key) => key.slice(this.keyPrefix.length));
  }
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, "\\$&");
}
