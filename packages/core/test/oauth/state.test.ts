import { beforeEach, describe, expect, it } from "vitest";
import { sha256Hex } from "../../src/crypto.js";
import { InvalidParameterError } from "../../src/errors.js";
import {
  encodeLaunchTokenState,
  parseLaunchTokenState,
  StateStore,
} from "../../src/oauth/state.js";
import { AesGcmCipher, encryptedStore } from "../../src/store/encrypted.js";
import { MemoryStore } from "../../src/store/memory.js";
import { createTestLogger, ManualClock, type TestLogger } from "../setup.js";

const PREFIX = "sso_";
const STATE = "a".repeat(40);
const KEY_A = "0".repeat(64);
const KEY_B = "f".repeat(64);

describe("StateStore", () => {
  let clock: ManualClock;
  let backend: MemoryStore;
  let logger: TestLogger;
  let states: StateStore;

  beforeEach(() => {
    clock = new ManualClock();
    backend = new MemoryStore(clock);
    logger = createTestLogger();
    states = new StateStore({
      store: backend,
      clock,
      logger,
      prefix: PREFIX,
      stateLength: 40,
      ttlSeconds: 900,
    });
  });

  describe("generateState", () => {
    it("should generate alphanumeric values of the configured length", () => {
      const state = states.generateState();
      expect(state).toMatch(/^[A-Za-z0-9]{40}$/);
    });

    it("should accept an explicit length of at least 32", () => {
      expect(states.generateState(32)).toHaveLength(32);
    });

    it("should reject lengths below 32", () => {
      expect(() => states.generateState(31)).toThrow(InvalidParameterError);
      expect(() => states.generateState(31)).toThrow(
        "State length must be an integer of at least 32, got 31",
      );
    });

    it("should not repeat across 10,000 values of length 40", () => {
      const values = Array.from({ length: 10_000 }, () => states.generateState(40));

      expect(new Set(values).size).toBe(10_000);
      expect(values.every((value) => value.length >= 40)).toBe(true);
    });
  });

  describe("store", () => {
    it("should key entries by the state hash, never the raw value", async () => {
      await states.store(STATE);

      const keys = await backend.keys("");
      expect(keys).toEqual([`${PREFIX}state_${sha256Hex(STATE)}`]);
      expect(keys[0]).not.toContain(STATE);
    });

    it("should record creation and expiry times", async () => {
      const record = await states.store(STATE, {}, 60);
      expect(record.createdAt).toBe(clock.now());
      expect(record.expiresAt).toBe(clock.now() + 60_000);
    });

    it("should reject an empty state", async () => {
      await expect(states.store("")).rejects.toThrow("State value cannot be empty");
    });
  });

  describe("retrieve", () => {
    it("should return the stored payload once when consuming", async () => {
      await states.store(STATE, { codeVerifier: "v".repeat(43) });

      const first = await states.retrieve(STATE);
      expect(first?.codeVerifier).toBe("v".repeat(43));
      expect(await states.retrieve(STATE)).toBeNull();
    });

    it("should leave the entry in place without consume", async () => {
      await states.store(STATE);

      expect(await states.retrieve(STATE, false)).not.toBeNull();
      expect(await states.retrieve(STATE, false)).not.toBeNull();
    });

    it("should let only one of two concurrent consumers through", async () => {
      await states.store(STATE);

      const results = await Promise.all([states.retrieve(STATE), states.retrieve(STATE)]);
      expect(results.filter((r) => r !== null)).toHaveLength(1);
    });

    it("should return null for unknown and empty states", async () => {
      expect(await states.retrieve("b".repeat(40))).toBeNull();
      expect(await states.retrieve("")).toBeNull();
    });

    it("should treat an entry as expired at exactly its expiry time", async () => {
      // No backend TTL, so only the recorded expiry applies
      await backend.put(`${PREFIX}state_${sha256Hex(STATE)}`, JSON.stringify({
        state: STATE,
        createdAt: clock.now(),
        expiresAt: clock.now() + 60_000,
      }));

      clock.advance(60_000);
      expect(await states.retrieve(STATE, false)).toBeNull();
      expect(await backend.keys("")).toEqual([]);
    });

    it("should drop undecodable entries", async () => {
      const key = `${PREFIX}state_${sha256Hex(STATE)}`;
      await backend.put(key, "not json");

      expect(await states.retrieve(STATE, false)).toBeNull();
      expect(await backend.get(key)).toBeNull();
      expect(logger.messages("warn")).toContain("Removing undecodable state entry");
    });

    it("should reject an entry whose recorded state differs", async () => {
      await backend.put(
        `${PREFIX}state_${sha256Hex(STATE)}`,
        JSON.stringify({ state: "other", createdAt: 0, expiresAt: clock.now() + 1000 }),
      );

      expect(await states.retrieve(STATE)).toBeNull();
      expect(logger.messages("warn")).toContain("State value mismatch");
    });

    it("should drop entries written under another encryption key", async () => {
      const writer = new StateStore({
        store: encryptedStore(backend, new AesGcmCipher(KEY_A)),
        clock,
        logger,
        prefix: PREFIX,
        stateLength: 40,
        ttlSeconds: 900,
      });
      const reader = new StateStore({
        store: encryptedStore(backend, new AesGcmCipher(KEY_B)),
        clock,
        logger,
        prefix: PREFIX,
        stateLength: 40,
        ttlSeconds: 900,
      });

      await writer.store(STATE);
      expect(await reader.retrieve(STATE)).toBeNull();
      expect(await backend.keys("")).toEqual([]);
      expect(logger.messages("warn")).toContain("Removing state entry that failed to decrypt");
    });
  });

  describe("retrievePkce", () => {
    it("should return the bound PKCE data without consuming it", async () => {
      await states.storePkce(STATE, {
        codeVerifier: "v".repeat(43),
        codeChallenge: "challenge",
        codeChallengeMethod: "S256",
      });

      expect(await states.retrievePkce(STATE)).toEqual({
        codeVerifier: "v".repeat(43),
        codeChallenge: "challenge",
        challengeMethod: "S256",
      });
      expect(await states.validateState(STATE)).toBe(true);
    });

    it("should return null when no verifier is bound", async () => {
      await states.store(STATE);
      expect(await states.retrievePkce(STATE)).toBeNull();
    });
  });

  describe("validateState", () => {
    it("should be single use by default", async () => {
      await states.store(STATE);

      expect(await states.validateState(STATE)).toBe(true);
      expect(await states.validateState(STATE)).toBe(false);
    });
  });

  describe("sweep", () => {
    it("should remove expired and undecodable entries only", async () => {
      await states.store("c".repeat(40), {}, 60);
      await states.store("d".repeat(40), {}, 600);
      await backend.put(`${PREFIX}state_broken`, "{");
      await backend.put(`${PREFIX}tokens`, "{}");

      // No backend TTL, so only the recorded expiry applies
      await backend.put(
        `${PREFIX}state_${sha256Hex("e".repeat(40))}`,
        JSON.stringify({ state: "e".repeat(40), createdAt: 0, expiresAt: clock.now() + 30_000 }),
      );
      clock.advance(120_000);

      expect(await states.sweep()).toBe(2);
      expect((await backend.keys("")).sort()).toEqual(
        [`${PREFIX}state_${sha256Hex("d".repeat(40))}`, `${PREFIX}tokens`].sort(),
      );
    });
  });

  describe("discard and clearAll", () => {
    it("should discard a single entry", async () => {
      await states.store(STATE);
      await states.discard(STATE);
      expect(await states.retrieve(STATE)).toBeNull();
    });

    it("should clear every key under the session prefix", async () => {
      await states.store(STATE);
      await backend.put(`${PREFIX}tokens`, "{}");
      await backend.put("other_key", "kept");

      expect(await states.clearAll()).toBe(2);
      expect(await backend.keys("")).toEqual(["other_key"]);
    });
  });
});

describe("launch token state", () => {
  it("should decode an encoded launch state", () => {
    const encoded = encodeLaunchTokenState({ launchToken: "lt-1", state: "inner-state" });
    expect(parseLaunchTokenState(encoded)).toEqual({ launchToken: "lt-1", state: "inner-state" });
  });

  it("should accept the url-safe alphabet", () => {
    const encoded = Buffer.from(
      JSON.stringify({ launch_token: "lt-2", state: "s" }),
      "utf8",
    ).toString("base64url");
    expect(parseLaunchTokenState(encoded)).toEqual({ launchToken: "lt-2", state: "s" });
  });

  it("should ignore ordinary opaque states", () => {
    expect(parseLaunchTokenState("a".repeat(40))).toBeNull();
    expect(parseLaunchTokenState("not base64!")).toBeNull();
  });

  it("should ignore base64 JSON without both fields", () => {
    const encoded = Buffer.from(JSON.stringify({ launch_token: "lt" })).toString("base64");
    expect(parseLaunchTokenState(encoded)).toBeNull();
  });
});
