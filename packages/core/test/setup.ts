/**
 * Test Setup
 *
 * Shared fixtures and in-process stand-ins for the provider: a transport
 * that answers from a route table, a manual clock, a capturing logger and
 * RSA keys for signing ID tokens.
 */

import { exportJWK, generateKeyPair, SignJWT, type JWK, type JWTPayload, type KeyLike } from "jose";
import type { Clock } from "../src/clock.js";
import { resolveConfig, type SsoConfig, type SsoConfigInput } from "../src/config.js";
import { TransportError, type TransportFailureReason } from "../src/errors.js";
import type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from "../src/http/transport.js";
import { parseJson } from "../src/json.js";
import type { LogContext, Logger, LogLevel } from "../src/logger.js";

// ============================================================
// Provider fixtures
// ============================================================

export const TEST_BASE_URL = "https://idp.example.test";
export const TEST_CLIENT_ID = "test-client";
export const TEST_CLIENT_SECRET = "test-secret";
export const TEST_REDIRECT_URI = "https://app.example.test/auth/sso/callback";

export const DISCOVERY_URL = `${TEST_BASE_URL}/.well-known/openid-configuration`;
export const AUTHORIZE_URL = `${TEST_BASE_URL}/oauth/authorize`;
export const TOKEN_URL = `${TEST_BASE_URL}/oauth/token`;
export const USERINFO_URL = `${TEST_BASE_URL}/oauth/userinfo`;
export const JWKS_URL = `${TEST_BASE_URL}/oauth/jwks`;
export const REVOKE_URL = `${TEST_BASE_URL}/oauth/revoke`;

/** 2025-01-01T00:00:00Z */
export const FIXED_NOW = Date.UTC(2025, 0, 1);

export function discoveryDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    issuer: TEST_BASE_URL,
    authorization_endpoint: AUTHORIZE_URL,
    token_endpoint: TOKEN_URL,
    userinfo_endpoint: USERINFO_URL,
    jwks_uri: JWKS_URL,
    revocation_endpoint: REVOKE_URL,
    end_session_endpoint: `${TEST_BASE_URL}/logout`,
    scopes_supported: ["openid", "profile", "email"],
    response_types_supported: ["code"],
    code_challenge_methods_supported: ["S256", "plain"],
    ...overrides,
  };
}

/**
 * Client configuration pointing at the test provider, without retries
 */
export function testConfig(overrides: SsoConfigInput = {}): SsoConfig {
  return resolveConfig({
    baseUrl: TEST_BASE_URL,
    clientId: TEST_CLIENT_ID,
    clientSecret: TEST_CLIENT_SECRET,
    redirectUri: TEST_REDIRECT_URI,
    ...overrides,
    http: { retryAttempts: 1, retryDelayMs: 0, ...overrides.http },
    logging: { level: "debug", ...overrides.logging },
  });
}

// ============================================================
// Transport
// ============================================================

export type MockReply =
  | { status?: number; body?: unknown; text?: string }
  | { fail: TransportFailureReason };

/**
 * Answers requests from a route table keyed by method and URL
 *
 * Replies for a route are served in order; the last one repeats. Requests
 * without a route fail like an unreachable host.
 */
export class MockTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  private readonly routes = new Map<string, MockReply[]>();

  on(method: HttpMethod, url: string, ...replies: MockReply[]): this {
    this.routes.set(`${method} ${url}`, replies);
    return this;
  }

  /** Registers the standard discovery document */
  withDiscovery(overrides: Record<string, unknown> = {}): this {
    return this.on("GET", DISCOVERY_URL, { body: discoveryDocument(overrides) });
  }

  async send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    this.requests.push(request);
    this.signals.push(signal);

    if (signal?.aborted) {
      throw new TransportError(`Request to ${request.url} was aborted`, "aborted", request.url);
    }

    const queue = this.routes.get(`${request.method} ${request.url}`) ?? [];
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (!reply) {
      throw new TransportError(`Network error: no route to ${request.url}`, "network", request.url);
    }

    if ("fail" in reply) {
      throw new TransportError(`Simulated ${reply.fail}`, reply.fail, request.url);
    }

    const text = reply.text ?? (reply.body === undefined ? "" : JSON.stringify(reply.body));
    const status = reply.status ?? 200;
    return { status, ok: status >= 200 && status < 300, text, body: parseJson(text) };
  }

  count(method: HttpMethod, url: string): number {
    return this.requests.filter((r) => r.method === method && r.url === url).length;
  }

  last(method: HttpMethod, url: string): HttpRequest | undefined {
    return this.requests.filter((r) => r.method === method && r.url === url).at(-1);
  }
}

// ============================================================
// Clock and logger
// ============================================================

export class ManualClock implements Clock {
  constructor(public current: number = FIXED_NOW) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  context?: LogContext;
}

export interface TestLogger extends Logger {
  entries: LogEntry[];
  messages(level: LogLevel): string[];
}

/**
 * Logger that records every entry, children included
 */
export function createTestLogger(entries: LogEntry[] = [], scope: string = "sso"): TestLogger {
  const record = (level: LogLevel) => (message: string, context?: LogContext) => {
    entries.push({ level, scope, message, context });
  };

  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: (child) => createTestLogger(entries, `${scope}:${child}`),
  };
}

// ============================================================
// ID tokens
// ============================================================

export interface SigningKey {
  kid: string;
  privateKey: KeyLike;
  jwk: JWK;
}

export async function createSigningKey(kid: string = "test-key-1"): Promise<SigningKey> {
  const { publicKey, privateKey } = await generateKeyPair("RS256", { extractable: true });
  const jwk = await exportJWK(publicKey);
  return { kid, privateKey, jwk: { ...jwk, kid, alg: "RS256", use: "sig" } };
}

/**
 * Signs an ID token for the test provider; `claims` override the defaults
 */
export async function signIdToken(
  key: SigningKey,
  clock: Clock,
  claims: JWTPayload = {},
): Promise<string> {
  const iat = Math.floor(clock.now() / 1000);
  return new SignJWT({
    iss: TEST_BASE_URL,
    aud: TEST_CLIENT_ID,
    sub: "user-123",
    iat,
    exp: iat + 300,
    ...claims,
  })
    .setProtectedHeader({ alg: "RS256", kid: key.kid })
    .sign(key.privateKey);
}
