/**
 * Encryption at rest for stored payloads
 *
 * Values are encrypted with AES-256-GCM; keys are left as they are (the core
 * already hashes anything sensitive that ends up in a key).
 */

import { createCipheriv, createDecipheriv, randomBytes } from "crypto";
import { errorMessage, SsoError } from "../errors.js";
import type { KeyValueStore } from "./types.js";

const IV_LENGTH = 12;
const TAG_LENGTH = 16;

/**
 * A stored value could not be decrypted or decoded
 */
export class CorruptEntryError extends SsoError {
  public readonly key: string;

  constructor(key: string, cause: unknown) {
    super(`Stored entry "${key}" could not be decrypted: ${errorMessage(cause)}`, "corrupt_entry", {
      cause,
    });
    this.name = "CorruptEntryError";
    this.key = key;
  }
}

export interface Cipher {
  encrypt(plaintext: string): string;
  /** Throws when the payload was tampered with or uses another key */
  decrypt(payload: string): string;
}

/**
 * Converts a 64 character hex key into 32 raw bytes
 */
function hexToKey(hex: string): Buffer {
  if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
    throw new Error("Encryption key must be exactly 64 hex characters (32 bytes)");
  }
  return Buffer.from(hex, "hex");
}

export class AesGcmCipher implements Cipher {
  private readonly key: Buffer;

  constructor(keyHex: string) {
    this.key = hexToKey(keyHex);
  }

  /**
   * @returns Base64 of IV + auth tag + ciphertext
   */
  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv("aes-256-gcm", this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString("base64");
  }

  decrypt(payload: string): string {
    const data = Buffer.from(payload, "base64");
    if (data.length < IV_LENGTH + TAG_LENGTH) {
      throw new Error("Encrypted payload is too short");
    }

    const iv = data.subarray(0, IV_LENGTH);
    const tag = data.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const decipher = createDecipheriv("aes-256-gcm", this.key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([
      decipher.update(data.subarray(IV_LENGTH + TAG_LENGTH)),
      decipher.final(),
    ]).toString("utf8");
  }
}

/**
 * Wraps a store so every value is encrypted before it is written
 *
 * Reads of values that fail to decrypt throw CorruptEntryError.
 */
export function encryptedStore(store: KeyValueStore, cipher: Cipher): KeyValueStore {
  const open = (key: string, payload: string | null): string | null => {
    if (payload === null) return null;
    try {
      return cipher.decrypt(payload);
    } catch (error) {
      throw new CorruptEntryError(key, error);
    }
  };

  return {
    get: async (key) => open(key, await store.get(key)),
    put: (key, value, ttlSeconds) => store.put(key, cipher.encrypt(value), ttlSeconds),
    forget: (key) => store.forget(key),
    take: async (key) => open(key, await store.take(key)),
    keys: (prefix) => store.keys(prefix),
  };
}
