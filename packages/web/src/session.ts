/**
 * Browser sessions
 *
 * The session cookie carries only a random id. Everything else (the core's
 * state entries and tokens, the mapped profile, the intended URL) lives in
 * a store namespaced by that id, encrypted when a key is configured.
 */

import { randomBytes } from "crypto";
import {
  AesGcmCipher,
  CorruptEntryError,
  encryptedStore,
  namespacedStore,
  parseJson,
  type KeyValueStore,
} from "@sso-bridge/core";
import { z } from "zod";
import type { UserProfile } from "./profile.js";

const PROFILE_KEY = "web:profile";
const INTENDED_KEY = "web:intended";

const SESSION_ID_PATTERN = /^[0-9a-f]{64}$/;

const profileSchema = z.record(z.string());

export function generateSessionId(): string {
  return randomBytes(32).toString("hex");
}

export function isSessionId(value: string | undefined): value is string {
  return value !== undefined && SESSION_ID_PATTERN.test(value);
}

export interface SessionStoreOptions {
  ttlSeconds: number;
  encryptionKey?: string;
}

/**
 * Carves one session's store out of the shared base store
 *
 * No entry outlives the session: writes without a TTL, or with a longer
 * one, are capped at the session TTL.
 */
export function sessionStore(
  base: KeyValueStore,
  sessionId: string,
  options: SessionStoreOptions,
): KeyValueStore {
  const scoped = namespacedStore(base, sessionId);
  const capped: KeyValueStore = {
    ...scoped,
    put: (key, value, ttlSeconds) =>
      scoped.put(key, value, Math.min(ttlSeconds ?? options.ttlSeconds, options.ttlSeconds)),
  };
  return options.encryptionKey
    ? encryptedStore(capped, new AesGcmCipher(options.encryptionKey))
    : capped;
}

export class WebSession {
  constructor(
    readonly id: string,
    readonly store: KeyValueStore,
  ) {}

  /**
   * Null when absent, malformed or no longer decryptable
   */
  async getProfile(): Promise<UserProfile | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(PROFILE_KEY);
    } catch (error) {
      if (!(error instanceof CorruptEntryError)) throw error;
      return null;
    }
    if (raw === null) return null;

    const parsed = profileSchema.safeParse(parseJson(raw));
    return parsed.success ? parsed.data : null;
  }

  async setProfile(profile: UserProfile): Promise<void> {
    await this.store.put(PROFILE_KEY, JSON.stringify(profile));
  }

  async rememberIntendedUrl(url: string): Promise<void> {
    await this.store.put(INTENDED_KEY, url);
  }

  /**
   * Returns and forgets the URL a guarded route was first requested at
   */
  async pullIntendedUrl(): Promise<string | null> {
    try {
      return await this.store.take(INTENDED_KEY);
    } catch (error) {
      if (!(error instanceof CorruptEntryError)) throw error;
      return null;
    }
  }

  /**
   * Forgets everything stored for this session
   */
  async destroy(): Promise<void> {
    for (const key of await this.store.keys("")) {
      await this.store.forget(key);
    }
  }
}
