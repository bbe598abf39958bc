/**
 * In-memory store for tests, local development and single-instance deployments
 */

import { systemClock, type Clock } from "../clock.js";
import type { KeyValueStore } from "./types.js";

interface MemoryEntry {
  value: string;
  /** Epoch ms, or null for no expiry */
  expiresAt: number | null;
}

export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(key: string): Promise<string | null> {
    return this.read(key);
  }

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds === undefined ? null : this.clock.now() + ttlSeconds * 1000,
    });
  }

  async forget(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async take(key: string): Promise<string | null> {
    // Read and delete happen in the same tick
    const value = this.read(key);
    this.entries.delete(key);
    return value;
  }

  async keys(prefix: string): Promise<string[]> {
    const result: string[] = [];
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix) && this.read(key) !== null) {
        result.push(key);
      }
    }
    return result;
  }

  /** Number of live entries */
  get size(): number {
    return [...this.entries.keys()].filter((key) => this.read(key) !== null).length;
  }

  private read(key: string): string | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== null && entry.expiresAt <= this.clock.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }
}
