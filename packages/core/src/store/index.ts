/**
 * Key/value stores
 *
 * Re-exports the store interface and the built-in implementations.
 */

export type { KeyValueStore } from "./types.js";
export { MemoryStore } from "./memory.js";
export { namespacedStore } from "./namespaced.js";
export { AesGcmCipher, CorruptEntryError, encryptedStore, type Cipher } from "./encrypted.js";
