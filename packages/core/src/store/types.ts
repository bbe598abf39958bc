/**
 * Key/value store contract
 *
 * The core keeps session data (pending authorization requests, tokens) and
 * process-wide data (discovery documents, signing keys) behind this interface.
 * Implementations can use different backends (in-memory, Upstash Redis, etc.)
 */

export interface KeyValueStore {
  get(key: string): Promise<string | null>;

  /**
   * Stores a value, expiring after `ttlSeconds` when given
   */
  put(key: string, value: string, ttlSeconds?: number): Promise<void>;

  forget(key: string): Promise<void>;

  /**
   * Atomically reads and deletes a value; of several concurrent callers at
   * most one receives it
   */
  take(key: string): Promise<string | null>;

  /**
   * Lists live keys starting with `prefix`
   */
  keys(prefix: string): Promise<string[]>;
}
