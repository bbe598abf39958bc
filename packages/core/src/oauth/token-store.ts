/**
 * Session-scoped persistence of the current TokenSet
 */

import { z } from "zod";
import { parseJson } from "../json.js";
import type { Logger } from "../logger.js";
import { CorruptEntryError } from "../store/encrypted.js";
import type { KeyValueStore } from "../store/types.js";
import type { TokenSet } from "./types.js";

const tokenSetSchema = z.object({
    accessToken: z.string().min(1),
    tokenType: z.string(),
    refreshToken: z.string().optional(),
    idToken: z.string().optional(),
    scope: z.string().optional(),
    expiresIn: z.number(),
    expiresAt: z.number(),
    storedAt: z.number(),
});

export class TokenStore {
    constructor(
        private readonly store: KeyValueStore,
        private readonly key: string,
        private readonly logger: Logger,
    ) {}

    async load(): Promise<TokenSet | null> {
        let raw: string | null;
        try {
            raw = await this.store.get(this.key);
        } catch (error) {
            if (!(error instanceof CorruptEntryError)) {
                throw error;
            }
            this.logger.warn("Stored tokens could not be decrypted, discarding");
            await this.store.forget(this.key);
            return null;
        }
        if (raw === null) return null;

        const parsed = tokenSetSchema.safeParse(parseJson(raw));
        if (!parsed.success) {
            this.logger.warn("Stored tokens are malformed, discarding");
            await this.store.forget(this.key);
            return null;
        }
        return parsed.data;
    }

    async save(tokens: TokenSet): Promise<void> {
        await this.store.put(this.key, JSON.stringify(tokens));
    }

    async clear(): Promise<void> {
        await this.store.forget(this.key);
    }
}
