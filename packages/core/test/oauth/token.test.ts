import { beforeEach, describe, expect, it } from "vitest";
import type { SsoConfig } from "../../src/config.js";
import {
  InvalidParameterError,
  TokenExchangeError,
  UserInfoError,
} from "../../src/errors.js";
import { DiscoveryCache } from "../../src/oauth/discovery.js";
import { generateCodeVerifier } from "../../src/oauth/pkce.js";
import { MAX_EXPIRES_IN, parseOAuthError, TokenExchanger } from "../../src/oauth/token.js";
import { TokenStore } from "../../src/oauth/token-store.js";
import { MemoryStore } from "../../src/store/memory.js";
import {
  createTestLogger,
  FIXED_NOW,
  ManualClock,
  MockTransport,
  REVOKE_URL,
  TEST_BASE_URL,
  TEST_CLIENT_ID,
  TEST_CLIENT_SECRET,
  TEST_REDIRECT_URI,
  testConfig,
  TOKEN_URL,
  USERINFO_URL,
  type TestLogger,
} from "../setup.js";

const VERIFIER = "v".repeat(64);

describe("TokenExchanger", () => {
  let clock: ManualClock;
  let transport: MockTransport;
  let logger: TestLogger;
  let exchanger: TokenExchanger;

  const createExchanger = (config: SsoConfig = testConfig()) => {
    const cache = new MemoryStore(clock);
    const discovery = new DiscoveryCache({ config, cache, transport, clock, logger });
    return new TokenExchanger({ config, discovery, transport, cache, clock, logger });
  };

  beforeEach(() => {
    clock = new ManualClock();
    transport = new MockTransport().withDiscovery();
    logger = createTestLogger();
    exchanger = createExchanger();
  });

  describe("exchangeCode", () => {
    it("should post the authorization_code grant and build a TokenSet", async () => {
      transport.on("POST", TOKEN_URL, {
        body: {
          access_token: "at-1",
          token_type: "Bearer",
          expires_in: 600,
          refresh_token: "rt-1",
          id_token: "idt-1",
          scope: "openid",
        },
      });

      const tokens = await exchanger.exchangeCode(
        "code-1",
        TEST_REDIRECT_URI,
        VERIFIER,
        TEST_CLIENT_ID,
        TEST_CLIENT_SECRET,
      );

      expect(transport.last("POST", TOKEN_URL)?.form).toEqual({
        grant_type: "authorization_code",
        client_id: TEST_CLIENT_ID,
        code: "code-1",
        redirect_uri: TEST_REDIRECT_URI,
        code_verifier: VERIFIER,
        client_secret: TEST_CLIENT_SECRET,
      });
      expect(tokens).toEqual({
        accessToken: "at-1",
        tokenType: "Bearer",
        refreshToken: "rt-1",
        idToken: "idt-1",
        scope: "openid",
        expiresIn: 600,
        expiresAt: FIXED_NOW + 600_000,
        storedAt: FIXED_NOW,
      });
    });

    it("should leave out client_secret for public clients", async () => {
      transport.on("POST", TOKEN_URL, { body: { access_token: "at-1" } });

      await exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID);

      expect(transport.last("POST", TOKEN_URL)?.form).not.toHaveProperty("client_secret");
    });

    it("should default the lifetime and token type when omitted", async () => {
      transport.on("POST", TOKEN_URL, { body: { access_token: "at-1" } });

      const tokens = await exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID);

      expect(tokens.expiresIn).toBe(3600);
      expect(tokens.expiresAt).toBe(FIXED_NOW + 3_600_000);
      expect(tokens.tokenType).toBe("Bearer");
      expect(tokens.refreshToken).toBeUndefined();
    });

    it("should accept expires_in sent as a numeric string", async () => {
      transport.on("POST", TOKEN_URL, { body: { access_token: "at-1", expires_in: "120" } });

      const tokens = await exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID);
      expect(tokens.expiresIn).toBe(120);
    });

    it("should cap huge lifetimes so the tokens survive storage", async () => {
      transport.on("POST", TOKEN_URL, { body: { access_token: "at-1", expires_in: 1e308 } });

      const tokens = await exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID);
      expect(tokens.expiresIn).toBe(MAX_EXPIRES_IN);
      expect(tokens.expiresAt).toBe(FIXED_NOW + 31_536_000_000);

      const tokenStore = new TokenStore(new MemoryStore(clock), "tokens", logger);
      await tokenStore.save(tokens);
      expect(await tokenStore.load()).toEqual(tokens);
    });

    it("should reject an empty code without calling the provider", async () => {
      await expect(
        exchanger.exchangeCode("", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID),
      ).rejects.toThrow(new InvalidParameterError("Authorization code cannot be empty"));
      expect(transport.requests).toHaveLength(0);
    });

    it("should reject a malformed verifier", async () => {
      await expect(
        exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, "short", TEST_CLIENT_ID),
      ).rejects.toThrow("Code verifier is malformed");
    });

    it("should surface the provider's OAuth error", async () => {
      transport.on("POST", TOKEN_URL, {
        status: 400,
        body: { error: "invalid_grant", error_description: "Code expired" },
      });

      const error = await exchanger
        .exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TokenExchangeError);
      expect(error).toMatchObject({
        message: "Token exchange failed: invalid_grant: Code expired",
        code: "invalid_grant",
        operation: "exchange",
        status: 400,
        error: "invalid_grant",
        errorDescription: "Code expired",
      });
    });

    it("should fall back to the HTTP status without an OAuth error body", async () => {
      transport.on("POST", TOKEN_URL, { status: 500, text: "upstream failure" });

      await expect(
        exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID),
      ).rejects.toMatchObject({
        message: "Token exchange failed: HTTP 500",
        code: "token_exchange_failed",
        status: 500,
      });
    });

    it("should reject a success response without an access token", async () => {
      transport.on("POST", TOKEN_URL, { body: { token_type: "Bearer" } });

      await expect(
        exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID),
      ).rejects.toMatchObject({
        message: "Invalid token response: access_token: Required",
        code: "invalid_token_response",
      });
    });

    it("should wrap transport failures", async () => {
      transport.on("POST", TOKEN_URL, { fail: "timeout" });

      await expect(
        exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID),
      ).rejects.toMatchObject({
        message: "Token exchange request failed: Simulated timeout",
        code: "token_request_failed",
      });
    });

    it("should warn about a non-bearer token type", async () => {
      transport.on("POST", TOKEN_URL, { body: { access_token: "at-1", token_type: "mac" } });

      await exchanger.exchangeCode("code-1", TEST_REDIRECT_URI, VERIFIER, TEST_CLIENT_ID);

      expect(logger.messages("warn")).toContain('Unexpected token type "mac" in exchange response');
    });
  });

  describe("refresh", () => {
    it("should post the refresh_token grant with the scopes", async () => {
      transport.on("POST", TOKEN_URL, { body: { access_token: "at-2", refresh_token: "rt-2" } });

      const tokens = await exchanger.refresh("rt-1", TEST_CLIENT_ID, TEST_CLIENT_SECRET, [
        "openid",
        "email",
      ]);

      expect(transport.last("POST", TOKEN_URL)?.form).toEqual({
        grant_type: "refresh_token",
        client_id: TEST_CLIENT_ID,
        refresh_token: "rt-1",
        client_secret: TEST_CLIENT_SECRET,
        scope: "openid email",
      });
      expect(tokens.accessToken).toBe("at-2");
      expect(tokens.refreshToken).toBe("rt-2");
    });

    it("should keep the old refresh token when none is returned", async () => {
      transport.on("POST", TOKEN_URL, { body: { access_token: "at-2" } });

      const tokens = await exchanger.refresh("rt-1", TEST_CLIENT_ID);
      expect(tokens.refreshToken).toBe("rt-1");
      expect(transport.last("POST", TOKEN_URL)?.form).not.toHaveProperty("scope");
    });

    it("should label failures as refresh failures", async () => {
      transport.on("POST", TOKEN_URL, { status: 400, body: { error: "invalid_grant" } });

      await expect(exchanger.refresh("rt-1", TEST_CLIENT_ID)).rejects.toMatchObject({
        message: "Token refresh failed: invalid_grant",
        operation: "refresh",
      });
    });

    it("should reject an empty refresh token", async () => {
      await expect(exchanger.refresh("", TEST_CLIENT_ID)).rejects.toThrow(
        "Refresh token cannot be empty",
      );
    });
  });

  describe("revoke", () => {
    it("should post the token with its type hint", async () => {
      transport.on("POST", REVOKE_URL, { status: 200 });

      expect(
        await exchanger.revoke("rt-1", TEST_CLIENT_ID, TEST_CLIENT_SECRET, "refresh_token"),
      ).toBe(true);
      expect(transport.last("POST", REVOKE_URL)?.form).toEqual({
        token: "rt-1",
        token_type_hint: "refresh_token",
        client_id: TEST_CLIENT_ID,
        client_secret: TEST_CLIENT_SECRET,
      });
    });

    it("should treat an empty token as already revoked", async () => {
      expect(await exchanger.revoke("", TEST_CLIENT_ID)).toBe(true);
      expect(transport.requests).toHaveLength(0);
    });

    it("should succeed without calling anything when no endpoint is advertised", async () => {
      transport.withDiscovery({ revocation_endpoint: undefined });

      expect(await exchanger.revoke("at-1", TEST_CLIENT_ID)).toBe(true);
      expect(transport.count("POST", REVOKE_URL)).toBe(0);
    });

    it("should accept invalid_token as already revoked", async () => {
      transport.on("POST", REVOKE_URL, { status: 400, body: { error: "invalid_token" } });

      expect(await exchanger.revoke("at-1", TEST_CLIENT_ID)).toBe(true);
    });

    it("should report other failures as false and log them", async () => {
      transport.on("POST", REVOKE_URL, { status: 503 });

      expect(await exchanger.revoke("at-1", TEST_CLIENT_ID)).toBe(false);
      expect(logger.messages("warn")).toContain("Token revocation failed: HTTP 503");
    });

    it("should report transport failures as false", async () => {
      transport.on("POST", REVOKE_URL, { fail: "network" });

      expect(await exchanger.revoke("at-1", TEST_CLIENT_ID)).toBe(false);
      expect(logger.messages("warn")).toContain(
        "Token revocation request failed: Simulated network",
      );
    });

    it("should report a discovery outage as false", async () => {
      const offline = createExchanger(testConfig({ baseUrl: "https://down.example.test" }));

      expect(await offline.revoke("at-1", TEST_CLIENT_ID)).toBe(false);
      expect(logger.messages("warn")[0]).toMatch(/^Revocation endpoint unavailable: /);
    });
  });

  describe("revokeTokens", () => {
    it("should revoke the access and refresh tokens", async () => {
      transport.on("POST", REVOKE_URL, { status: 200 });

      expect(
        await exchanger.revokeTokens({ accessToken: "at-1", refreshToken: "rt-1" }, TEST_CLIENT_ID),
      ).toBe(true);

      const hints = transport.requests
        .filter((r) => r.url === REVOKE_URL)
        .map((r) => r.form?.token_type_hint);
      expect(hints).toEqual(["access_token", "refresh_token"]);
    });

    it("should report false when any revocation fails", async () => {
      transport.on("POST", REVOKE_URL, { status: 200 }, { status: 500 });

      expect(
        await exchanger.revokeTokens({ accessToken: "at-1", refreshToken: "rt-1" }, TEST_CLIENT_ID),
      ).toBe(false);
    });

    it("should skip the refresh token when there is none", async () => {
      transport.on("POST", REVOKE_URL, { status: 200 });

      await exchanger.revokeTokens({ accessToken: "at-1" }, TEST_CLIENT_ID);
      expect(transport.count("POST", REVOKE_URL)).toBe(1);
    });
  });

  describe("getUserInfo", () => {
    it("should send the access token as a bearer token", async () => {
      transport.on("GET", USERINFO_URL, { body: { sub: "user-123", email: "user@example.test" } });

      expect(await exchanger.getUserInfo("at-1")).toEqual({
        sub: "user-123",
        email: "user@example.test",
      });
      expect(transport.last("GET", USERINFO_URL)?.headers).toEqual({
        Authorization: "Bearer at-1",
      });
    });

    it("should fail on a non-success status", async () => {
      transport.on("GET", USERINFO_URL, { status: 401 });

      const error = await exchanger.getUserInfo("at-1").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(UserInfoError);
      expect(error).toMatchObject({
        status: 401,
        message: "Userinfo request failed with HTTP 401",
      });
    });

    it("should fail when the provider has no userinfo endpoint", async () => {
      transport.withDiscovery({ userinfo_endpoint: undefined });

      await expect(exchanger.getUserInfo("at-1")).rejects.toThrow(
        "Provider advertises no userinfo endpoint",
      );
    });

    it("should reject a body that is not an object", async () => {
      transport.on("GET", USERINFO_URL, { body: ["sub"] });

      await expect(exchanger.getUserInfo("at-1")).rejects.toThrow(
        "Userinfo response is not a JSON object",
      );
    });
  });

  describe("resolveLaunchToken", () => {
    const LAUNCH_URL = `${TEST_BASE_URL}/api/launch-token/lt-1`;

    it("should return the bound state and verifier", async () => {
      const verifier = generateCodeVerifier(43);
      transport.on("GET", LAUNCH_URL, { body: { state: "inner", code_verifier: verifier } });

      expect(await exchanger.resolveLaunchToken("lt-1")).toEqual({
        state: "inner",
        codeVerifier: verifier,
      });
    });

    it("should encode the token into the path", async () => {
      await exchanger.resolveLaunchToken("a/b");
      expect(transport.requests.at(-1)?.url).toBe(`${TEST_BASE_URL}/api/launch-token/a%2Fb`);
    });

    it("should return null on a non-success status", async () => {
      transport.on("GET", LAUNCH_URL, { status: 404 });

      expect(await exchanger.resolveLaunchToken("lt-1")).toBeNull();
      expect(logger.messages("warn")).toContain(
        "Launch token endpoint returned non-success response",
      );
    });

    it("should return null for a malformed response", async () => {
      transport.on("GET", LAUNCH_URL, { body: { state: "inner" } });

      expect(await exchanger.resolveLaunchToken("lt-1")).toBeNull();
    });

    it("should return null when the request fails", async () => {
      expect(await exchanger.resolveLaunchToken("lt-1")).toBeNull();
      expect(logger.messages("warn")).toContain("Failed to retrieve launch token data");
    });
  });
});

describe("parseOAuthError", () => {
  it("should read error and error_description", () => {
    expect(parseOAuthError({ error: "invalid_client", error_description: "Bad secret" })).toEqual({
      error: "invalid_client",
      errorDescription: "Bad secret",
    });
  });

  it("should ignore non-string fields and non-objects", () => {
    expect(parseOAuthError({ error: 42 })).toEqual({
      error: undefined,
      errorDescription: undefined,
    });
    expect(parseOAuthError(null)).toEqual({});
  });
});
