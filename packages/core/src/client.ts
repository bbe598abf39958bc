/**
 * SSO client
 *
 * Sequences PKCE generation, state storage, discovery and the token endpoint
 * into the login flow:
 *
 *   idle → awaiting_callback → authenticated → (refreshing) → logged_out
 *
 * with `failed` reachable from any phase. One client serves one session; the
 * session-scoped store it receives holds the pending authorization requests
 * and the TokenSet, the process-wide cache holds provider metadata.
 */

import { systemClock, type Clock } from "./clock.js";
import { validateConfig, type SsoConfig } from "./config.js";
import { safeEqual } from "./crypto.js";
import {
  AuthenticationRequiredError,
  AuthorizationError,
  errorMessage,
  SsoError,
  StateError,
  TokenExchangeError,
  toSsoError,
} from "./errors.js";
import { FetchTransport, type HttpTransport } from "./http/transport.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { DiscoveryCache } from "./oauth/discovery.js";
import { createPkcePair } from "./oauth/pkce.js";
import { parseLaunchTokenState, StateStore } from "./oauth/state.js";
import { TokenExchanger } from "./oauth/token.js";
import { TokenStore } from "./oauth/token-store.js";
import type {
  CallbackParams,
  CallbackResult,
  IdTokenClaims,
  TokenSet,
  UserInfoClaims,
} from "./oauth/types.js";
import type { KeyValueStore } from "./store/types.js";

export type AuthPhase =
  | "idle"
  | "awaiting_callback"
  | "authenticated"
  | "refreshing"
  | "logged_out"
  | "failed";

/**
 * Everything the client needs from its host
 */
export interface SsoContext {
  config: SsoConfig;
  /** Scoped to the current user session */
  sessionStore: KeyValueStore;
  /** Shared by every session in the process */
  cache: KeyValueStore;
  /** Defaults to a FetchTransport built from `config` */
  transport?: HttpTransport;
  clock?: Clock;
  logger?: Logger;
  /** Aborts in-flight provider calls, e.g. when the HTTP request is cancelled */
  signal?: AbortSignal;
}

export interface RedirectOptions {
  prompt?: string;
  loginHint?: string;
  /** Replaces the configured scopes for this request */
  scopes?: string[];
  extraParams?: Record<string, string>;
}

export interface LogoutResult {
  /** False when any revocation failed; local state is cleared regardless */
  revoked: boolean;
}

/** Parameters an extra may not override */
const PROTECTED_PARAMS = new Set([
  "response_type",
  "client_id",
  "redirect_uri",
  "state",
  "code_challenge",
  "code_challenge_method",
]);

export class SsoClient {
  readonly config: SsoConfig;
  readonly stateStore: StateStore;
  readonly discovery: DiscoveryCache;
  readonly tokens: TokenExchanger;

  private readonly tokenStore: TokenStore;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private currentPhase: AuthPhase = "idle";

  constructor(context: SsoContext) {
    validateConfig(context.config);

    const config = context.config;
    const clock = context.clock ?? systemClock;
    const logger =
      context.logger ??
      createConsoleLogger({ enabled: config.logging.enabled, level: config.logging.level });
    const transport =
      context.transport ?? FetchTransport.fromConfig(config, { logger: logger.child("http") });

    this.config = config;
    this.clock = clock;
    this.logger = logger;

    this.stateStore = new StateStore({
      store: context.sessionStore,
      clock,
      logger: logger.child("state"),
      prefix: config.session.prefix,
      stateLength: config.security.stateLength,
      ttlSeconds: config.session.lifetimeMinutes * 60,
    });
    this.discovery = new DiscoveryCache({
      config,
      cache: context.cache,
      transport,
      clock,
      logger: logger.child("discovery"),
      signal: context.signal,
    });
    this.tokens = new TokenExchanger({
      config,
      discovery: this.discovery,
      transport,
      cache: context.cache,
      clock,
      logger: logger.child("token"),
      signal: context.signal,
    });
    this.tokenStore = new TokenStore(
      context.sessionStore,
      `${config.session.prefix}tokens`,
      logger.child("session"),
    );
  }

  get phase(): AuthPhase {
    return this.currentPhase;
  }

  // ============================================================
  // Login flow
  // ============================================================

  /**
   * Starts a login and returns the provider URL to send the user to
   *
   * The authorization endpoint is resolved before anything is stored, so a
   * provider outage leaves no orphaned state entry behind.
   */
  async redirect(options: RedirectOptions = {}): Promise<string> {
    try {
      const endpoint = await this.discovery.getEndpoint("authorization_endpoint");

      const { security } = this.config;
      const state = this.stateStore.generateState();
      const pkce = createPkcePair(security.codeVerifierLength, security.codeChallengeMethod);
      await this.stateStore.storePkce(state, pkce);

      const url = new URL(endpoint);
      const params = url.searchParams;
      params.set("response_type", "code");
      params.set("client_id", this.config.clientId);
      params.set("redirect_uri", this.config.redirectUri);
      params.set("scope", (options.scopes ?? this.config.scopes).join(" "));
      params.set("state", state);
      params.set("code_challenge", pkce.codeChallenge);
      params.set("code_challenge_method", pkce.codeChallengeMethod);

      if (options.prompt) params.set("prompt", options.prompt);
      if (options.loginHint) params.set("login_hint", options.loginHint);

      for (const [name, value] of Object.entries(options.extraParams ?? {})) {
        if (PROTECTED_PARAMS.has(name)) {
          this.logger.warn(`Ignoring extra authorization parameter "${name}"`);
          continue;
        }
        params.set(name, value);
      }

      this.currentPhase = "awaiting_callback";
      this.logger.debug("Authorization request created", { endpoint });
      return url.toString();
    } catch (error) {
      this.currentPhase = "failed";
      this.logFailure("Failed to build authorization URL", error);
      throw error;
    }
  }

  /**
   * Completes a login from the provider's callback parameters
   *
   * Never throws. On failure the state entry is discarded and no tokens are
   * stored.
   */
  async handleCallback(params: CallbackParams): Promise<CallbackResult> {
    const state = params.state ?? "";

    try {
      if (params.error) {
        throw new AuthorizationError(params.error, params.errorDescription ?? undefined);
      }
      if (!params.code || !state) {
        throw new StateError("Callback is missing the authorization code or state");
      }

      const codeVerifier = await this.resolveVerifier(state);
      const tokens = await this.tokens.exchangeCode(
        params.code,
        this.config.redirectUri,
        codeVerifier,
        this.config.clientId,
        this.config.clientSecret,
      );
      await this.tokenStore.save(tokens);

      this.currentPhase = "authenticated";
      if (this.config.logging.logSuccess) {
        this.logger.info("Login completed", { expiresAt: tokens.expiresAt });
      }
      return { ok: true, value: tokens };
    } catch (error) {
      const failure = toSsoError(error, "Callback handling failed");
      await this.discardQuietly(state);
      this.currentPhase = "failed";
      this.logFailure("Login failed", failure);
      return { ok: false, error: failure };
    }
  }

  /**
   * Exchanges the stored refresh token for a new TokenSet
   *
   * An ID token missing from the refresh response is carried over. A refresh
   * token the provider rejects as `invalid_grant` is dropped.
   */
  async refresh(): Promise<TokenSet> {
    const current = await this.tokenStore.load();
    if (!current?.refreshToken) {
      throw new AuthenticationRequiredError("No refresh token available");
    }

    this.currentPhase = "refreshing";
    try {
      const refreshed = await this.tokens.refresh(
        current.refreshToken,
        this.config.clientId,
        this.config.clientSecret,
        this.config.scopes,
      );
      const merged: TokenSet = {
        ...refreshed,
        idToken: refreshed.idToken ?? current.idToken,
      };
      await this.tokenStore.save(merged);

      this.currentPhase = "authenticated";
      if (this.config.logging.logSuccess) {
        this.logger.info("Tokens refreshed", { expiresAt: merged.expiresAt });
      }
      return merged;
    } catch (error) {
      this.currentPhase = "failed";
      if (error instanceof TokenExchangeError && error.error === "invalid_grant") {
        await this.tokenStore.clear();
      }
      this.logFailure("Token refresh failed", error);
      throw error;
    }
  }

  /**
   * Revokes what can be revoked and clears the session. Never throws.
   */
  async logout(): Promise<LogoutResult> {
    let revoked = true;
    try {
      revoked = await this.revokeTokens();
    } catch (error) {
      revoked = false;
      this.logger.warn("Token revocation skipped", { error: errorMessage(error) });
    }

    try {
      const removed = await this.stateStore.clearAll();
      this.logger.debug(`Cleared ${removed} session entries`);
    } catch (error) {
      this.logger.error("Failed to clear session state", { error: errorMessage(error) });
    }

    this.currentPhase = "logged_out";
    if (this.config.logging.logSuccess) {
      this.logger.info("Logged out", { revoked });
    }
    return { revoked };
  }

  // ============================================================
  // Session accessors
  // ============================================================

  /**
   * True while the access token is live, or expired but refreshable
   */
  async isAuthenticated(): Promise<boolean> {
    const tokens = await this.tokenStore.load();
    if (!tokens) return false;
    return tokens.expiresAt > this.clock.now() || Boolean(tokens.refreshToken);
  }

  async getTokens(): Promise<TokenSet | null> {
    return this.tokenStore.load();
  }

  async getAccessToken(): Promise<string | null> {
    return (await this.tokenStore.load())?.accessToken ?? null;
  }

  async getRefreshToken(): Promise<string | null> {
    return (await this.tokenStore.load())?.refreshToken ?? null;
  }

  async getIdToken(): Promise<string | null> {
    return (await this.tokenStore.load())?.idToken ?? null;
  }

  /**
   * Returns a live access token, refreshing an expired one first
   */
  async getValidAccessToken(): Promise<string> {
    const tokens = await this.tokenStore.load();
    if (!tokens) {
      throw new AuthenticationRequiredError("Not authenticated");
    }
    if (tokens.expiresAt > this.clock.now()) {
      return tokens.accessToken;
    }
    if (!tokens.refreshToken) {
      throw new AuthenticationRequiredError(
        "Access token expired and no refresh token is available",
      );
    }
    return (await this.refresh()).accessToken;
  }

  async getUserInfo(): Promise<UserInfoClaims> {
    return this.tokens.getUserInfo(await this.getValidAccessToken());
  }

  /**
   * Validates the given ID token, or the stored one when omitted
   * @returns null when there is no ID token to validate
   */
  async validateIdToken(
    idToken?: string,
    verifySignature: boolean = true,
  ): Promise<IdTokenClaims | null> {
    const token = idToken ?? (await this.getIdToken());
    if (!token) return null;
    return this.tokens.validateIdToken(token, verifySignature);
  }

  /**
   * Revokes the stored tokens without clearing them
   * @returns true when nothing needed revoking or every revocation succeeded
   */
  async revokeTokens(): Promise<boolean> {
    const tokens = await this.tokenStore.load();
    if (!tokens) return true;
    return this.tokens.revokeTokens(tokens, this.config.clientId, this.config.clientSecret);
  }

  /**
   * Provider logout URL, optionally sending the user back to `redirectUrl`
   */
  getLogoutUrl(redirectUrl?: string): string {
    const url = new URL(`${this.config.baseUrl}${this.config.endpoints.logout}`);
    if (redirectUrl) {
      url.searchParams.set("redirect_uri", redirectUrl);
    }
    return url.toString();
  }

  // ============================================================
  // Internals
  // ============================================================

  /**
   * Finds the code verifier bound to a callback's state
   *
   * Launch-token states are resolved through the provider; everything else
   * consumes the local state entry.
   */
  private async resolveVerifier(state: string): Promise<string> {
    const launch = parseLaunchTokenState(state);
    if (launch) {
      const grant = await this.tokens.resolveLaunchToken(launch.launchToken);
      if (!grant) {
        throw new StateError("Launch token could not be resolved");
      }
      if (!safeEqual(grant.state, launch.state)) {
        throw new StateError("Launch token state mismatch");
      }
      return grant.codeVerifier;
    }

    const request = await this.stateStore.retrieve(state, true);
    if (!request) {
      throw new StateError("Invalid or expired state");
    }
    if (!request.codeVerifier) {
      throw new StateError("State entry carries no code verifier");
    }
    return request.codeVerifier;
  }

  private async discardQuietly(state: string): Promise<void> {
    try {
      await this.stateStore.discard(state);
    } catch (error) {
      this.logger.warn("Failed to discard state entry", { error: errorMessage(error) });
    }
  }

  private logFailure(message: string, error: unknown): void {
    if (!this.config.logging.logFailures) return;
    const code = error instanceof SsoError ? error.code : undefined;
    this.logger.error(message, { error: errorMessage(error), code });
  }
}
