/**
 * ID token validation
 *
 * Signature and claim checks are delegated to `jose`. The provider's key set
 * is cached with a short TTL; when a token names a key the cached set does
 * not contain, the set is fetched again once before giving up.
 */

import {
    createLocalJWKSet,
    decodeJwt,
    errors as joseErrors,
    jwtVerify,
    type JSONWebKeySet,
} from "jose";
import { z } from "zod";
import type { Clock } from "../clock.js";
import type { SsoConfig } from "../config.js";
import { sha256Hex } from "../crypto.js";
import { errorMessage, TokenValidationError } from "../errors.js";
import type { HttpResponse, HttpTransport } from "../http/transport.js";
import { formatZodError, parseJson } from "../json.js";
import type { Logger } from "../logger.js";
import type { KeyValueStore } from "../store/types.js";
import type { DiscoveryCache } from "./discovery.js";
import type { IdTokenClaims } from "./types.js";

const jwkSchema = z.object({
    kty: z.string(),
    kid: z.string().optional(),
    use: z.string().optional(),
    alg: z.string().optional(),
    key_ops: z.array(z.string()).optional(),
    n: z.string().optional(),
    e: z.string().optional(),
    crv: z.string().optional(),
    x: z.string().optional(),
    y: z.string().optional(),
    x5c: z.array(z.string()).optional(),
    x5t: z.string().optional(),
});

const jwksSchema = z.object({
    keys: z.array(jwkSchema),
});

interface LoadedKeySet {
    keys: JSONWebKeySet;
    fromCache: boolean;
}

export interface IdTokenValidatorOptions {
    config: SsoConfig;
    discovery: DiscoveryCache;
    transport: HttpTransport;
    cache: KeyValueStore;
    clock: Clock;
    logger: Logger;
    signal?: AbortSignal;
}

export class IdTokenValidator {
    private readonly options: IdTokenValidatorOptions;

    constructor(options: IdTokenValidatorOptions) {
        this.options = options;
    }

    /**
     * Validates an ID token and returns its claims
     */
    async validate(token: string, verifySignature: boolean = true): Promise<IdTokenClaims> {
        if (!token) {
            throw new TokenValidationError("ID token is empty");
        }

        if (!verifySignature) {
            return this.decodeUnverified(token);
        }

        const document = await this.options.discovery.getDocument();
        const loaded = await this.loadKeySet(document.jwks_uri, false);

        try {
            return await this.verify(token, loaded.keys, document.issuer);
        } catch (error) {
            if (!(error instanceof joseErrors.JWKSNoMatchingKey) || !loaded.fromCache) {
                throw toValidationError(error);
            }
        }

        // Key set may have rotated since it was cached
        this.options.logger.info("No matching signing key in cached key set, refetching");
        const refreshed = await this.loadKeySet(document.jwks_uri, true);
        try {
            return await this.verify(token, refreshed.keys, document.issuer);
        } catch (error) {
            throw toValidationError(error);
        }
    }

    /**
     * Decodes the payload without any signature or claim checks.
     * UNSAFE: for debugging only, never for authenticating a user.
     */
    decodeUnverified(token: string): IdTokenClaims {
        this.options.logger.warn(
            "ID token decoded WITHOUT signature verification; do not use in production",
        );
        try {
            return decodeJwt(token);
        } catch (error) {
            throw new TokenValidationError(`Malformed ID token: ${errorMessage(error)}`, {
                cause: error,
                reason: "malformed",
            });
        }
    }

    private async verify(
        token: string,
        keys: JSONWebKeySet,
        issuer: string,
    ): Promise<IdTokenClaims> {
        const { payload } = await jwtVerify(token, createLocalJWKSet(keys), {
            issuer,
            audience: this.options.config.clientId,
            currentDate: new Date(this.options.clock.now()),
            requiredClaims: ["exp"],
        });
        return payload;
    }

    private keySetCacheKey(jwksUri: string): string {
        return `${this.options.config.cache.prefix}jwks_${sha256Hex(jwksUri)}`;
    }

    private async loadKeySet(jwksUri: string, forceRefresh: boolean): Promise<LoadedKeySet> {
        const { config, cache, logger } = this.options;
        const cacheKey = this.keySetCacheKey(jwksUri);

        if (config.cache.enabled && !forceRefresh) {
            const cached = await this.readCachedKeySet(cacheKey);
            if (cached) {
                return { keys: cached, fromCache: true };
            }
        }

        const keys = await this.fetchKeySet(jwksUri);

        if (config.cache.enabled) {
            try {
                await cache.put(cacheKey, JSON.stringify(keys), config.cache.jwksTtlSeconds);
            } catch (error) {
                logger.warn("Key set cache write failed", { error: errorMessage(error) });
            }
        }
        return { keys, fromCache: false };
    }

    private async readCachedKeySet(cacheKey: string): Promise<JSONWebKeySet | null> {
        try {
            const raw = await this.options.cache.get(cacheKey);
            if (raw === null) return null;

            const parsed = jwksSchema.safeParse(parseJson(raw));
            return parsed.success ? parsed.data : null;
        } catch (error) {
            this.options.logger.warn("Key set cache read failed", { error: errorMessage(error) });
            return null;
        }
    }

    private async fetchKeySet(jwksUri: string): Promise<JSONWebKeySet> {
        let response: HttpResponse;
        try {
            response = await this.options.transport.send(
                { method: "GET", url: jwksUri },
                this.options.signal,
            );
        } catch (error) {
            throw new TokenValidationError(
                `Failed to fetch signing keys from ${jwksUri}: ${errorMessage(error)}`,
                { cause: error, reason: "jwks_unavailable" },
            );
        }

        if (!response.ok) {
            throw new TokenValidationError(
                `Signing key request to ${jwksUri} failed with HTTP ${response.status}`,
                { reason: "jwks_unavailable" },
            );
        }

        const parsed = jwksSchema.safeParse(response.body);
        if (!parsed.success) {
            throw new TokenValidationError(
                `Invalid key set from ${jwksUri}: ${formatZodError(parsed.error)}`,
                { reason: "jwks_invalid" },
            );
        }
        return parsed.data;
    }
}

function toValidationError(error: unknown): TokenValidationError {
    if (error instanceof TokenValidationError) {
        return error;
    }
    const reason = error instanceof joseErrors.JOSEError ? error.code : undefined;
    return new TokenValidationError(`ID token validation failed: ${errorMessage(error)}`, {
        cause: error,
        reason,
    });
}
