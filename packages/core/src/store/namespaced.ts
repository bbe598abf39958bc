/**
 * Scopes a shared store to one namespace, e.g. a single user session
 */

import type { KeyValueStore } from "./types.js";

export function namespacedStore(store: KeyValueStore, namespace: string): KeyValueStore {
  const prefix = `${namespace}:`;

  return {
    get: (key) => store.get(prefix + key),
    put: (key, value, ttlSeconds) => store.put(prefix + key, value, ttlSeconds),
    forget: (key) => store.forget(prefix + key),
    take: (key) => store.take(prefix + key),
    keys: async (keyPrefix) => {
      const keys = await store.keys(prefix + keyPrefix);
      return keys.map((key) => key.slice(prefix.length));
    },
  };
}
