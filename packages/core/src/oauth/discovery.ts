/**
 * OpenID Connect discovery
 *
 * Fetches `{baseUrl}/.well-known/openid-configuration`, validates it in full
 * and caches it in the process-wide cache. A document is only ever written
 * after validation, so readers see the previous document or the new one.
 */

import { z } from "zod";
import type { Clock } from "../clock.js";
import type { SsoConfig } from "../config.js";
import { sha256Hex } from "../crypto.js";
import { DiscoveryError, EndpointNotFoundError, errorMessage } from "../errors.js";
import type { HttpResponse, HttpTransport } from "../http/transport.js";
import { formatZodError, parseJson } from "../json.js";
import type { Logger } from "../logger.js";
import type { KeyValueStore } from "../store/types.js";

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === "https:" || url.protocol === "http:";
    } catch {
        return false;
    }
}

const httpUrl = z
    .string({ required_error: "Required" })
    .min(1, "must not be empty")
    .refine(isHttpUrl, "must be an absolute http(s) URL");

export const discoveryDocumentSchema = z.object({
    issuer: httpUrl,
    authorization_endpoint: httpUrl,
    token_endpoint: httpUrl,
    jwks_uri: httpUrl,
    userinfo_endpoint: httpUrl.optional(),
    revocation_endpoint: httpUrl.optional(),
    end_session_endpoint: httpUrl.optional(),
    scopes_supported: z.array(z.string()).optional(),
    response_types_supported: z.array(z.string()).optional(),
    code_challenge_methods_supported: z.array(z.string()).optional(),
});

const cachedDocumentSchema = discoveryDocumentSchema.extend({
    fetchedAt: z.number(),
});

export type DiscoveryDocument = z.infer<typeof cachedDocumentSchema>;

export type EndpointName =
    | "authorization_endpoint"
    | "token_endpoint"
    | "jwks_uri"
    | "userinfo_endpoint"
    | "revocation_endpoint"
    | "end_session_endpoint";

export interface DiscoveryCacheOptions {
    config: SsoConfig;
    cache: KeyValueStore;
    transport: HttpTransport;
    clock: Clock;
    logger: Logger;
    signal?: AbortSignal;
}

export class DiscoveryCache {
    private readonly config: SsoConfig;
    private readonly cache: KeyValueStore;
    private readonly transport: HttpTransport;
    private readonly clock: Clock;
    private readonly logger: Logger;
    private readonly signal?: AbortSignal;

    constructor(options: DiscoveryCacheOptions) {
        this.config = options.config;
        this.cache = options.cache;
        this.transport = options.transport;
        this.clock = options.clock;
        this.logger = options.logger;
        this.signal = options.signal;
    }

    get discoveryUrl(): string {
        return `${this.config.baseUrl}${this.config.endpoints.discovery}`;
    }

    get cacheKey(): string {
        return `${this.config.cache.prefix}discovery_${sha256Hex(this.config.baseUrl)}`;
    }

    /**
     * Returns the provider's discovery document
     *
     * A cached document is used while fresh unless `forceRefresh` is set.
     * When a refresh fails without `forceRefresh`, a stale cached copy is
     * served instead of failing.
     */
    async getDocument(forceRefresh: boolean = false): Promise<DiscoveryDocument> {
        const cached = this.config.cache.enabled ? await this.readCache() : null;

        if (cached && !forceRefresh && this.isFresh(cached)) {
            return cached;
        }

        let document: DiscoveryDocument;
        try {
            document = await this.fetchDocument();
        } catch (error) {
            if (cached && !forceRefresh && error instanceof DiscoveryError) {
                this.logger.warn("Discovery refresh failed, serving stale document", {
                    error: error.message,
                    fetchedAt: cached.fetchedAt,
                });
                return cached;
            }
            throw error;
        }

        if (this.config.cache.enabled) {
            await this.writeCache(document);
        }
        return document;
    }

    /**
     * Returns a named endpoint or throws EndpointNotFoundError
     */
    async getEndpoint(name: EndpointName, forceRefresh: boolean = false): Promise<string> {
        const document = await this.getDocument(forceRefresh);
        const endpoint = document[name];
        if (!endpoint) {
            throw new EndpointNotFoundError(name);
        }
        return endpoint;
    }

    async getSupportedScopes(): Promise<string[]> {
        return (await this.getDocument()).scopes_supported ?? [];
    }

    async getSupportedResponseTypes(): Promise<string[]> {
        return (await this.getDocument()).response_types_supported ?? ["code"];
    }

    async getSupportedCodeChallengeMethods(): Promise<string[]> {
        return (await this.getDocument()).code_challenge_methods_supported ?? ["S256"];
    }

    /**
     * True when the provider advertises any PKCE method
     */
    async isPkceRequired(): Promise<boolean> {
        return (await this.getSupportedCodeChallengeMethods()).length > 0;
    }

    /**
     * Evicts the cached document. Failures are logged, never thrown.
     */
    async clearCache(): Promise<boolean> {
        try {
            await this.cache.forget(this.cacheKey);
            return true;
        } catch (error) {
            this.logger.warn("Failed to clear discovery cache", { error: errorMessage(error) });
            return false;
        }
    }

    private isFresh(document: DiscoveryDocument): boolean {
        return document.fetchedAt + this.config.cache.discoveryTtlSeconds * 1000 > this.clock.now();
    }

    private async fetchDocument(): Promise<DiscoveryDocument> {
        const url = this.discoveryUrl;
        let response: HttpResponse;

        try {
            response = await this.transport.send({ method: "GET", url }, this.signal);
        } catch (error) {
            throw new DiscoveryError(
                `Failed to fetch discovery document from ${url}: ${errorMessage(error)}`,
                { cause: error },
            );
        }

        if (!response.ok) {
            throw new DiscoveryError(
                `Discovery request to ${url} failed with HTTP ${response.status}`,
                { status: response.status },
            );
        }

        const parsed = discoveryDocumentSchema.safeParse(response.body);
        if (!parsed.success) {
            throw new DiscoveryError(
                `Invalid discovery document from ${url}: ${formatZodError(parsed.error)}`,
            );
        }

        this.logger.debug("Fetched discovery document", { issuer: parsed.data.issuer });
        return { ...parsed.data, fetchedAt: this.clock.now() };
    }

    /**
     * Cache misses, unreadable entries and cache outages all read as null
     */
    private async readCache(): Promise<DiscoveryDocument | null> {
        try {
            const raw = await this.cache.get(this.cacheKey);
            if (raw === null) return null;

            const parsed = cachedDocumentSchema.safeParse(parseJson(raw));
            return parsed.success ? parsed.data : null;
        } catch (error) {
            this.logger.warn("Discovery cache read failed", { error: errorMessage(error) });
            return null;
        }
    }

    /**
     * Entries outlive their freshness window so a stale copy can be served
     * while the provider is unreachable
     */
    private async writeCache(document: DiscoveryDocument): Promise<void> {
        try {
            await this.cache.put(
                this.cacheKey,
                JSON.stringify(document),
                this.config.cache.discoveryTtlSeconds * 2,
            );
        } catch (error) {
            this.logger.warn("Discovery cache write failed", { error: errorMessage(error) });
        }
    }
}
