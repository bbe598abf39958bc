/**
 * OAuth / OIDC types shared by the client components
 */

import type { JWTPayload } from "jose";
import type { ChallengeMethod } from "../config.js";
import type { SsoError } from "../errors.js";

/**
 * PKCE verifier/challenge pair (RFC 7636)
 */
export interface PkcePair {
    codeVerifier: string;
    codeChallenge: string;
    codeChallengeMethod: ChallengeMethod;
}

/**
 * Pending authorization request kept by the state store
 */
export interface AuthorizationRequest {
    state: string;
    /** Epoch ms */
    createdAt: number;
    /** Epoch ms */
    expiresAt: number;
    codeVerifier?: string;
    codeChallenge?: string;
    challengeMethod?: string;
}

/**
 * Data bound to a state value when it is stored
 */
export type StatePayload = Pick<
    AuthorizationRequest,
    "codeVerifier" | "codeChallenge" | "challengeMethod"
>;

export interface PkceData {
    codeVerifier: string;
    codeChallenge?: string;
    challengeMethod: string;
}

/**
 * Raw token endpoint response (RFC 6749 §5.1)
 */
export interface OAuthTokenResponse {
    access_token: string;
    token_type?: string;
    expires_in?: number;
    refresh_token?: string;
    id_token?: string;
    scope?: string;
}

/**
 * Tokens held for the current session
 */
export interface TokenSet {
    accessToken: string;
    tokenType: string;
    refreshToken?: string;
    idToken?: string;
    scope?: string;
    /** Lifetime in seconds as reported by the provider */
    expiresIn: number;
    /** Epoch ms */
    expiresAt: number;
    /** Epoch ms */
    storedAt: number;
}

export type IdTokenClaims = JWTPayload;

export type UserInfoClaims = Record<string, unknown>;

/**
 * Decoded deep-link state pointing at a provider-issued launch token
 */
export interface LaunchTokenState {
    launchToken: string;
    state: string;
}

/**
 * What the provider's launch-token endpoint returns
 */
export interface LaunchTokenGrant {
    state: string;
    codeVerifier: string;
}

export interface CallbackParams {
    code?: string | null;
    state?: string | null;
    error?: string | null;
    errorDescription?: string | null;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type CallbackResult = Result<TokenSet, SsoError>;

export type TokenTypeHint = "access_token" | "refresh_token";
