/**
 * Anti-CSRF state storage
 *
 * Each pending authorization request is stored under a key derived from a
 * SHA-256 hash of its state value, never the raw value. Entries are single
 * use: a consuming read takes the entry atomically, so of two concurrent
 * callbacks carrying the same state at most one proceeds.
 */

import { z } from "zod";
import type { Clock } from "../clock.js";
import { randomAlphanumeric, safeEqual, sha256Hex } from "../crypto.js";
import { InvalidParameterError } from "../errors.js";
import { parseJson } from "../json.js";
import type { Logger } from "../logger.js";
import { CorruptEntryError } from "../store/encrypted.js";
import type { KeyValueStore } from "../store/types.js";
import type {
    AuthorizationRequest,
    LaunchTokenState,
    PkceData,
    PkcePair,
    StatePayload,
} from "./types.js";

export const MIN_STATE_LENGTH = 32;

const storedRequestSchema = z.object({
    state: z.string(),
    createdAt: z.number(),
    expiresAt: z.number(),
    codeVerifier: z.string().optional(),
    codeChallenge: z.string().optional(),
    challengeMethod: z.string().optional(),
});

const launchTokenStateSchema = z.object({
    launch_token: z.string().min(1),
    state: z.string().min(1),
});

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

export interface StateStoreOptions {
    store: KeyValueStore;
    clock: Clock;
    logger: Logger;
    /** Key prefix shared with the rest of the session data */
    prefix: string;
    stateLength: number;
    ttlSeconds: number;
}

export class StateStore {
    private readonly backend: KeyValueStore;
    private readonly clock: Clock;
    private readonly logger: Logger;
    private readonly prefix: string;
    private readonly stateLength: number;
    private readonly ttlSeconds: number;

    constructor(options: StateStoreOptions) {
        this.backend = options.store;
        this.clock = options.clock;
        this.logger = options.logger;
        this.prefix = options.prefix;
        this.stateLength = options.stateLength;
        this.ttlSeconds = options.ttlSeconds;
    }

    /**
     * Generates a random alphanumeric state value
     */
    generateState(length: number = this.stateLength): string {
        if (!Number.isInteger(length) || length < MIN_STATE_LENGTH) {
            throw new InvalidParameterError(
                `State length must be an integer of at least ${MIN_STATE_LENGTH}, got ${length}`,
            );
        }
        return randomAlphanumeric(length);
    }

    /**
     * Persists a pending authorization request
     */
    async store(
        state: string,
        payload: StatePayload = {},
        ttlSeconds: number = this.ttlSeconds,
    ): Promise<AuthorizationRequest> {
        if (!state) {
            throw new InvalidParameterError("State value cannot be empty");
        }

        const now = this.clock.now();
        const record: AuthorizationRequest = {
            state,
            createdAt: now,
            expiresAt: now + ttlSeconds * 1000,
            ...payload,
        };

        await this.backend.put(this.keyFor(state), JSON.stringify(record), ttlSeconds);
        this.logger.debug("Stored state entry", { expiresAt: record.expiresAt });
        return record;
    }

    /**
     * Persists a state value together with its PKCE pair
     */
    async storePkce(
        state: string,
        pkce: PkcePair,
        ttlSeconds?: number,
    ): Promise<AuthorizationRequest> {
        return this.store(
            state,
            {
                codeVerifier: pkce.codeVerifier,
                codeChallenge: pkce.codeChallenge,
                challengeMethod: pkce.codeChallengeMethod,
            },
            ttlSeconds,
        );
    }

    /**
     * Looks up a pending request
     *
     * Returns null when the entry is absent, expired, undecodable or does not
     * match `state`. With `consume` the entry is removed as it is read.
     */
    async retrieve(state: string, consume: boolean = true): Promise<AuthorizationRequest | null> {
        if (!state) return null;

        const key = this.keyFor(state);
        const raw = await this.read(key, consume);
        if (raw === null) return null;

        const record = decodeRecord(raw);
        if (!record) {
            this.logger.warn("Removing undecodable state entry");
            if (!consume) await this.backend.forget(key);
            return null;
        }

        if (!safeEqual(record.state, state)) {
            this.logger.warn("State value mismatch");
            return null;
        }

        if (record.expiresAt <= this.clock.now()) {
            this.logger.debug("State entry expired", { expiresAt: record.expiresAt });
            if (!consume) await this.backend.forget(key);
            return null;
        }

        return record;
    }

    /**
     * Reads the PKCE data bound to a state without consuming it
     */
    async retrievePkce(state: string): Promise<PkceData | null> {
        const record = await this.retrieve(state, false);
        if (!record?.codeVerifier) return null;

        return {
            codeVerifier: record.codeVerifier,
            codeChallenge: record.codeChallenge,
            challengeMethod: record.challengeMethod ?? "S256",
        };
    }

    async validateState(state: string, consume: boolean = true): Promise<boolean> {
        return (await this.retrieve(state, consume)) !== null;
    }

    /**
     * Removes the entry for a state regardless of its contents
     */
    async discard(state: string): Promise<void> {
        if (!state) return;
        await this.backend.forget(this.keyFor(state));
    }

    /**
     * Removes expired and undecodable state entries
     * @returns Number of entries removed
     */
    async sweep(): Promise<number> {
        const now = this.clock.now();
        let removed = 0;

        for (const key of await this.backend.keys(`${this.prefix}state_`)) {
            if (await this.shouldKeep(key, now)) continue;
            await this.backend.forget(key);
            removed++;
        }

        if (removed > 0) {
            this.logger.debug(`Swept ${removed} state entries`);
        }
        return removed;
    }

    /**
     * Removes every key under the session prefix, tokens included
     * @returns Number of entries removed
     */
    async clearAll(): Promise<number> {
        const keys = await this.backend.keys(this.prefix);
        for (const key of keys) {
            await this.backend.forget(key);
        }
        return keys.length;
    }

    /**
     * False for expired, undecodable and undecryptable entries
     */
    private async shouldKeep(key: string, now: number): Promise<boolean> {
        let raw: string | null;
        try {
            raw = await this.backend.get(key);
        } catch (error) {
            if (error instanceof CorruptEntryError) return false;
            throw error;
        }
        // Already gone
        if (raw === null) return true;

        const record = decodeRecord(raw);
        return record !== null && record.expiresAt > now;
    }

    private keyFor(state: string): string {
        return `${this.prefix}state_${sha256Hex(state)}`;
    }

    /**
     * Reads (or takes) a raw value, dropping entries that fail to decrypt
     */
    private async read(key: string, consume: boolean): Promise<string | null> {
        try {
            return consume ? await this.backend.take(key) : await this.backend.get(key);
        } catch (error) {
            if (!(error instanceof CorruptEntryError)) {
                throw error;
            }
            this.logger.warn("Removing state entry that failed to decrypt");
            await this.backend.forget(key);
            return null;
        }
    }
}

function decodeRecord(raw: string): AuthorizationRequest | null {
    const parsed = storedRequestSchema.safeParse(parseJson(raw));
    return parsed.success ? parsed.data : null;
}

/**
 * Decodes a deep-link state (base64 JSON carrying `launch_token` and `state`).
 * Returns null for ordinary opaque state values.
 */
export function parseLaunchTokenState(value: string): LaunchTokenState | null {
    if (!BASE64_PATTERN.test(value)) return null;

    const decoded = parseJson(Buffer.from(value, "base64").toString("utf8"));
    const parsed = launchTokenStateSchema.safeParse(decoded);
    if (!parsed.success) return null;

    return { launchToken: parsed.data.launch_token, state: parsed.data.state };
}

/**
 * Encodes a launch-token state the way providers issue it
 */
export function encodeLaunchTokenState(launch: LaunchTokenState): string {
    return Buffer.from(
        JSON.stringify({ launch_token: launch.launchToken, state: launch.state }),
        "utf8",
    ).toString("base64");
}
