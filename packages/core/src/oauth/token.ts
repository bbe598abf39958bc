/**
 * Token endpoint operations
 *
 * Code exchange, refresh, revocation (RFC 7009), userinfo, launch-token
 * lookup and ID token validation against the endpoints that discovery
 * resolves.
 */

import { z } from "zod";
import type { Clock } from "../clock.js";
import type { SsoConfig } from "../config.js";
import {
    EndpointNotFoundError,
    errorMessage,
    InvalidParameterError,
    RevocationError,
    TokenExchangeError,
    UserInfoError,
    type TokenOperation,
} from "../errors.js";
import type { HttpResponse, HttpTransport } from "../http/transport.js";
import { formatZodError, isRecord } from "../json.js";
import type { Logger } from "../logger.js";
import type { KeyValueStore } from "../store/types.js";
import type { DiscoveryCache } from "./discovery.js";
import { IdTokenValidator } from "./id-token.js";
import { validateCodeVerifier } from "./pkce.js";
import type {
    IdTokenClaims,
    LaunchTokenGrant,
    OAuthTokenResponse,
    TokenSet,
    TokenTypeHint,
    UserInfoClaims,
} from "./types.js";

/** Assumed lifetime when the provider omits expires_in */
export const DEFAULT_EXPIRES_IN = 3600;

/** Longer lifetimes are cut to a year; expiresAt must stay a finite number */
export const MAX_EXPIRES_IN = 365 * 24 * 3600;

const optionalString = z
    .string()
    .nullish()
    .transform((value) => value ?? undefined);

const tokenResponseSchema = z.object({
    access_token: z
        .string({ invalid_type_error: "must be a string" })
        .min(1, "must not be empty"),
    token_type: optionalString,
    expires_in: z
        .union([
            z.number().finite(),
            z
                .string()
                .regex(/^\d+(\.\d+)?$/, "must be numeric")
                .transform(Number),
        ])
        .transform((seconds) => Math.min(seconds, MAX_EXPIRES_IN))
        .nullish()
        .transform((value) => value ?? undefined),
    refresh_token: optionalString,
    id_token: optionalString,
    scope: optionalString,
});

const launchTokenGrantSchema = z.object({
    state: z.string().min(1),
    code_verifier: z.string().min(1),
});

interface UpstreamError {
    error?: string;
    errorDescription?: string;
}

/**
 * Pulls `error` / `error_description` out of an OAuth error body
 */
export function parseOAuthError(body: unknown): UpstreamError {
    if (!isRecord(body)) return {};
    return {
        error: typeof body.error === "string" ? body.error : undefined,
        errorDescription:
            typeof body.error_description === "string" ? body.error_description : undefined,
    };
}

export interface TokenExchangerOptions {
    config: SsoConfig;
    discovery: DiscoveryCache;
    transport: HttpTransport;
    cache: KeyValueStore;
    clock: Clock;
    logger: Logger;
    signal?: AbortSignal;
}

export class TokenExchanger {
    private readonly config: SsoConfig;
    private readonly discovery: DiscoveryCache;
    private readonly transport: HttpTransport;
    private readonly clock: Clock;
    private readonly logger: Logger;
    private readonly signal?: AbortSignal;
    private readonly idTokens: IdTokenValidator;

    constructor(options: TokenExchangerOptions) {
        this.config = options.config;
        this.discovery = options.discovery;
        this.transport = options.transport;
        this.clock = options.clock;
        this.logger = options.logger;
        this.signal = options.signal;
        this.idTokens = new IdTokenValidator(options);
    }

    // ============================================================
    // Grants
    // ============================================================

    /**
     * Exchanges an authorization code for tokens (authorization_code grant)
     */
    async exchangeCode(
        code: string,
        redirectUri: string,
        codeVerifier: string,
        clientId: string,
        clientSecret?: string,
    ): Promise<TokenSet> {
        if (!code) {
            throw new InvalidParameterError("Authorization code cannot be empty");
        }
        if (!validateCodeVerifier(codeVerifier)) {
            throw new InvalidParameterError("Code verifier is malformed");
        }

        const form: Record<string, string> = {
            grant_type: "authorization_code",
            client_id: clientId,
            code,
            redirect_uri: redirectUri,
            code_verifier: codeVerifier,
        };
        if (clientSecret) {
            form.client_secret = clientSecret;
        }

        const response = await this.requestTokens("exchange", form);
        return this.toTokenSet(response);
    }

    /**
     * Obtains a new access token (refresh_token grant)
     *
     * Providers need not rotate the refresh token; when the response omits
     * one, the token passed in is kept.
     */
    async refresh(
        refreshToken: string,
        clientId: string,
        clientSecret?: string,
        scopes?: string[],
    ): Promise<TokenSet> {
        if (!refreshToken) {
            throw new InvalidParameterError("Refresh token cannot be empty");
        }

        const form: Record<string, string> = {
            grant_type: "refresh_token",
            client_id: clientId,
            refresh_token: refreshToken,
        };
        if (clientSecret) {
            form.client_secret = clientSecret;
        }
        if (scopes && scopes.length > 0) {
            form.scope = scopes.join(" ");
        }

        const response = await this.requestTokens("refresh", form);
        return this.toTokenSet(response, refreshToken);
    }

    // ============================================================
    // Revocation
    // ============================================================

    /**
     * Revokes a token. Best effort: failures are logged and reported as false.
     *
     * An empty token, a provider without a revocation endpoint and a 400
     * `invalid_token` answer (token already gone) all count as success.
     */
    async revoke(
        token: string,
        clientId: string,
        clientSecret?: string,
        tokenTypeHint: TokenTypeHint = "access_token",
    ): Promise<boolean> {
        if (!token) return true;

        let endpoint: string | undefined;
        try {
            endpoint = (await this.discovery.getDocument()).revocation_endpoint;
        } catch (error) {
            this.report(
                new RevocationError(`Revocation endpoint unavailable: ${errorMessage(error)}`, {
                    cause: error,
                }),
                tokenTypeHint,
            );
            return false;
        }

        if (!endpoint) {
            this.logger.debug("Provider advertises no revocation endpoint, skipping");
            return true;
        }

        const form: Record<string, string> = {
            token,
            token_type_hint: tokenTypeHint,
            client_id: clientId,
        };
        if (clientSecret) {
            form.client_secret = clientSecret;
        }

        let response: HttpResponse;
        try {
            response = await this.transport.send({ method: "POST", url: endpoint, form }, this.signal);
        } catch (error) {
            this.report(
                new RevocationError(`Token revocation request failed: ${errorMessage(error)}`, {
                    cause: error,
                }),
                tokenTypeHint,
            );
            return false;
        }

        if (response.ok) {
            return true;
        }

        const upstream = parseOAuthError(response.body);
        if (response.status === 400 && upstream.error === "invalid_token") {
            return true;
        }

        this.report(
            new RevocationError(
                `Token revocation failed: ${upstream.error ?? `HTTP ${response.status}`}`,
                { status: response.status },
            ),
            tokenTypeHint,
        );
        return false;
    }

    /**
     * Revokes the access token and, when present, the refresh token
     * @returns true only when every attempted revocation succeeded
     */
    async revokeTokens(
        tokens: Pick<TokenSet, "accessToken" | "refreshToken">,
        clientId: string,
        clientSecret?: string,
    ): Promise<boolean> {
        const results = [await this.revoke(tokens.accessToken, clientId, clientSecret, "access_token")];
        if (tokens.refreshToken) {
            results.push(
                await this.revoke(tokens.refreshToken, clientId, clientSecret, "refresh_token"),
            );
        }
        return results.every(Boolean);
    }

    // ============================================================
    // User info and launch tokens
    // ============================================================

    /**
     * Fetches the userinfo claims for an access token
     */
    async getUserInfo(accessToken: string): Promise<UserInfoClaims> {
        let endpoint: string;
        try {
            endpoint = await this.discovery.getEndpoint("userinfo_endpoint");
        } catch (error) {
            if (error instanceof EndpointNotFoundError) {
                throw new UserInfoError("Provider advertises no userinfo endpoint", { cause: error });
            }
            throw error;
        }

        let response: HttpResponse;
        try {
            response = await this.transport.send(
                {
                    method: "GET",
                    url: endpoint,
                    headers: { Authorization: `Bearer ${accessToken}` },
                },
                this.signal,
            );
        } catch (error) {
            throw new UserInfoError(`Userinfo request failed: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        if (!response.ok) {
            throw new UserInfoError(`Userinfo request failed with HTTP ${response.status}`, {
                status: response.status,
            });
        }

        if (!isRecord(response.body)) {
            throw new UserInfoError("Userinfo response is not a JSON object", {
                status: response.status,
            });
        }
        return response.body;
    }

    /**
     * Looks up a provider-issued launch token
     * @returns The bound state and code verifier, or null when unusable
     */
    async resolveLaunchToken(launchToken: string): Promise<LaunchTokenGrant | null> {
        const url = `${this.config.baseUrl}${this.config.endpoints.launchToken}/${encodeURIComponent(launchToken)}`;

        let response: HttpResponse;
        try {
            response = await this.transport.send({ method: "GET", url }, this.signal);
        } catch (error) {
            this.logger.warn("Failed to retrieve launch token data", {
                error: errorMessage(error),
            });
            return null;
        }

        if (!response.ok) {
            this.logger.warn("Launch token endpoint returned non-success response", {
                status: response.status,
            });
            return null;
        }

        const parsed = launchTokenGrantSchema.safeParse(response.body);
        if (!parsed.success) {
            this.logger.warn("Launch token response is malformed", {
                issues: formatZodError(parsed.error),
            });
            return null;
        }

        return { state: parsed.data.state, codeVerifier: parsed.data.code_verifier };
    }

    // ============================================================
    // ID tokens
    // ============================================================

    /**
     * Validates an ID token. With `verifySignature` false the payload is only
     * decoded, which is unsafe outside of debugging.
     */
    async validateIdToken(token: string, verifySignature: boolean = true): Promise<IdTokenClaims> {
        return this.idTokens.validate(token, verifySignature);
    }

    // ============================================================
    // Internals
    // ============================================================

    private async requestTokens(
        operation: TokenOperation,
        form: Record<string, string>,
    ): Promise<OAuthTokenResponse> {
        const label = operation === "exchange" ? "Token exchange" : "Token refresh";
        const endpoint = await this.discovery.getEndpoint("token_endpoint");

        let response: HttpResponse;
        try {
            response = await this.transport.send({ method: "POST", url: endpoint, form }, this.signal);
        } catch (error) {
            throw new TokenExchangeError(`${label} request failed: ${errorMessage(error)}`, {
                operation,
                code: "token_request_failed",
                cause: error,
            });
        }

        if (!response.ok) {
            const upstream = parseOAuthError(response.body);
            const detail = upstream.error
                ? upstream.errorDescription
                    ? `${upstream.error}: ${upstream.errorDescription}`
                    : upstream.error
                : `HTTP ${response.status}`;

            throw new TokenExchangeError(`${label} failed: ${detail}`, {
                operation,
                status: response.status,
                error: upstream.error,
                errorDescription: upstream.errorDescription,
            });
        }

        const parsed = tokenResponseSchema.safeParse(response.body);
        if (!parsed.success) {
            throw new TokenExchangeError(
                `Invalid token response: ${formatZodError(parsed.error)}`,
                { operation, status: response.status, code: "invalid_token_response" },
            );
        }

        const tokenType = parsed.data.token_type;
        if (tokenType && tokenType.toLowerCase() !== "bearer") {
            this.logger.warn(`Unexpected token type "${tokenType}" in ${operation} response`);
        }

        return parsed.data;
    }

    private toTokenSet(response: OAuthTokenResponse, previousRefreshToken?: string): TokenSet {
        const now = this.clock.now();
        const expiresIn = response.expires_in ?? DEFAULT_EXPIRES_IN;

        return {
            accessToken: response.access_token,
            tokenType: response.token_type ?? "Bearer",
            refreshToken: response.refresh_token ?? previousRefreshToken,
            idToken: response.id_token,
            scope: response.scope,
            expiresIn,
            expiresAt: now + expiresIn * 1000,
            storedAt: now,
        };
    }

    private report(error: RevocationError, tokenTypeHint: TokenTypeHint): void {
        this.logger.warn(error.message, { code: error.code, hint: tokenTypeHint });
    }
}
