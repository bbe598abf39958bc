/**
 * Configuration module for the SSO client
 */

import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel, type Logger } from "./logger.js";
import { redactSensitiveData } from "./redact.js";

export type ChallengeMethod = "S256" | "plain";

export const CHALLENGE_METHODS: readonly ChallengeMethod[] = ["S256", "plain"];

export function isChallengeMethod(value: string): value is ChallengeMethod {
  return CHALLENGE_METHODS.some((method) => method === value);
}

/**
 * Paths on the provider, relative to the base URL
 */
export interface EndpointPaths {
  discovery: string;
  logout: string;
  launchToken: string;
}

export interface SecurityConfig {
  codeChallengeMethod: ChallengeMethod;
  stateLength: number;
  codeVerifierLength: number;
  /** Verify the provider's TLS certificate */
  verifyTls: boolean;
}

export interface SessionConfig {
  /** Prefix for every session-scoped key (state entries and tokens) */
  prefix: string;
  /** Lifetime of a pending authorization request */
  lifetimeMinutes: number;
}

export interface HttpConfig {
  timeoutMs: number;
  connectTimeoutMs: number;
  /** Total attempts per request, including the first */
  retryAttempts: number;
  retryDelayMs: number;
}

export interface CacheConfig {
  enabled: boolean;
  prefix: string;
  discoveryTtlSeconds: number;
  jwksTtlSeconds: number;
}

export interface LoggingConfig {
  enabled: boolean;
  level: LogLevel;
  logSuccess: boolean;
  logFailures: boolean;
}

export interface SsoConfig {
  baseUrl: string;
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
  scopes: string[];
  endpoints: EndpointPaths;
  security: SecurityConfig;
  session: SessionConfig;
  http: HttpConfig;
  cache: CacheConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration accepted by resolveConfig; omitted values use defaults
 */
export interface SsoConfigInput {
  baseUrl?: string;
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  scopes?: string[];
  endpoints?: Partial<EndpointPaths>;
  security?: Partial<Omit<SecurityConfig, "codeChallengeMethod">> & {
    codeChallengeMethod?: string;
  };
  session?: Partial<SessionConfig>;
  http?: Partial<HttpConfig>;
  cache?: Partial<CacheConfig>;
  logging?: Partial<Omit<LoggingConfig, "level">> & { level?: string };
}

export const DEFAULT_SCOPES = ["openid", "profile", "email"];

export const DEFAULT_ENDPOINTS: EndpointPaths = {
  discovery: "/.well-known/openid-configuration",
  logout: "/logout",
  launchToken: "/api/launch-token",
};

export const DEFAULT_SECURITY: SecurityConfig = {
  codeChallengeMethod: "S256",
  stateLength: 40,
  codeVerifierLength: 128,
  verifyTls: true,
};

export const DEFAULT_SESSION: SessionConfig = {
  prefix: "sso_",
  lifetimeMinutes: 15,
};

export const DEFAULT_HTTP: HttpConfig = {
  timeoutMs: 30_000,
  connectTimeoutMs: 10_000,
  retryAttempts: 3,
  retryDelayMs: 1_000,
};

export const DEFAULT_CACHE: CacheConfig = {
  enabled: true,
  prefix: "sso_client_",
  discoveryTtlSeconds: 3600,
  jwksTtlSeconds: 300,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  enabled: true,
  level: "info",
  logSuccess: true,
  logFailures: true,
};

/**
 * Splits a scope list given as "openid profile" or "openid,profile"
 */
export function parseScopes(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((scope) => scope.trim())
    .filter((scope) => scope !== "");
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function secondsToMs(value: number | undefined): number | undefined {
  return value === undefined ? undefined : value * 1000;
}

/**
 * Reads SSO_* environment variables into a partial configuration
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): SsoConfigInput {
  return {
    baseUrl: env.SSO_BASE_URL,
    clientId: env.SSO_CLIENT_ID,
    clientSecret: env.SSO_CLIENT_SECRET || undefined,
    redirectUri: env.SSO_REDIRECT_URI,
    scopes: env.SSO_SCOPES ? parseScopes(env.SSO_SCOPES) : undefined,
    security: {
      codeChallengeMethod: env.SSO_CODE_CHALLENGE_METHOD || undefined,
      stateLength: parseNumber(env.SSO_STATE_LENGTH),
      codeVerifierLength: parseNumber(env.SSO_CODE_VERIFIER_LENGTH),
      verifyTls: parseBoolean(env.SSO_VERIFY_SSL),
    },
    session: {
      prefix: env.SSO_SESSION_PREFIX || undefined,
      lifetimeMinutes: parseNumber(env.SSO_SESSION_LIFETIME),
    },
    http: {
      timeoutMs: secondsToMs(parseNumber(env.SSO_HTTP_TIMEOUT)),
      connectTimeoutMs: secondsToMs(parseNumber(env.SSO_HTTP_CONNECT_TIMEOUT)),
      retryAttempts: parseNumber(env.SSO_HTTP_RETRY_ATTEMPTS),
      retryDelayMs: parseNumber(env.SSO_HTTP_RETRY_DELAY),
    },
    cache: {
      enabled: parseBoolean(env.SSO_CACHE_ENABLED),
      prefix: env.SSO_CACHE_PREFIX || undefined,
      discoveryTtlSeconds: parseNumber(env.SSO_CACHE_DISCOVERY_TTL),
      jwksTtlSeconds: parseNumber(env.SSO_CACHE_JWKS_TTL),
    },
    logging: {
      enabled: parseBoolean(env.SSO_LOGGING_ENABLED),
      level: env.SSO_LOG_LEVEL?.toLowerCase() || undefined,
      logSuccess: parseBoolean(env.SSO_LOG_SUCCESS),
      logFailures: parseBoolean(env.SSO_LOG_FAILURES),
    },
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Fills in defaults and validates, throwing ConfigurationError on any problem
 */
export function resolveConfig(input: SsoConfigInput): SsoConfig {
  const problems: string[] = [];

  const method = input.security?.codeChallengeMethod ?? DEFAULT_SECURITY.codeChallengeMethod;
  if (!isChallengeMethod(method)) {
    problems.push(`Unsupported code challenge method "${method}" (expected S256 or plain)`);
  }

  const level = input.logging?.level ?? DEFAULT_LOGGING.level;
  if (!isLogLevel(level)) {
    problems.push(`Unknown log level "${level}"`);
  }

  const config: SsoConfig = {
    baseUrl: stripTrailingSlash(input.baseUrl?.trim() ?? ""),
    clientId: input.clientId?.trim() ?? "",
    clientSecret: input.clientSecret,
    redirectUri: input.redirectUri?.trim() ?? "",
    scopes: input.scopes ?? [...DEFAULT_SCOPES],
    endpoints: {
      discovery: input.endpoints?.discovery ?? DEFAULT_ENDPOINTS.discovery,
      logout: input.endpoints?.logout ?? DEFAULT_ENDPOINTS.logout,
      launchToken: input.endpoints?.launchToken ?? DEFAULT_ENDPOINTS.launchToken,
    },
    security: {
      codeChallengeMethod: isChallengeMethod(method) ? method : DEFAULT_SECURITY.codeChallengeMethod,
      stateLength: input.security?.stateLength ?? DEFAULT_SECURITY.stateLength,
      codeVerifierLength: input.security?.codeVerifierLength ?? DEFAULT_SECURITY.codeVerifierLength,
      verifyTls: input.security?.verifyTls ?? DEFAULT_SECURITY.verifyTls,
    },
    session: {
      prefix: input.session?.prefix ?? DEFAULT_SESSION.prefix,
      lifetimeMinutes: input.session?.lifetimeMinutes ?? DEFAULT_SESSION.lifetimeMinutes,
    },
    http: {
      timeoutMs: input.http?.timeoutMs ?? DEFAULT_HTTP.timeoutMs,
      connectTimeoutMs: input.http?.connectTimeoutMs ?? DEFAULT_HTTP.connectTimeoutMs,
      retryAttempts: input.http?.retryAttempts ?? DEFAULT_HTTP.retryAttempts,
      retryDelayMs: input.http?.retryDelayMs ?? DEFAULT_HTTP.retryDelayMs,
    },
    cache: {
      enabled: input.cache?.enabled ?? DEFAULT_CACHE.enabled,
      prefix: input.cache?.prefix ?? DEFAULT_CACHE.prefix,
      discoveryTtlSeconds: input.cache?.discoveryTtlSeconds ?? DEFAULT_CACHE.discoveryTtlSeconds,
      jwksTtlSeconds: input.cache?.jwksTtlSeconds ?? DEFAULT_CACHE.jwksTtlSeconds,
    },
    logging: {
      enabled: input.logging?.enabled ?? DEFAULT_LOGGING.enabled,
      level: isLogLevel(level) ? level : DEFAULT_LOGGING.level,
      logSuccess: input.logging?.logSuccess ?? DEFAULT_LOGGING.logSuccess,
      logFailures: input.logging?.logFailures ?? DEFAULT_LOGGING.logFailures,
    },
  };

  problems.push(...collectProblems(config));
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

/**
 * Loads configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SsoConfig {
  return resolveConfig(readEnv(env));
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

function checkInteger(
  problems: string[],
  name: string,
  value: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    problems.push(
      max === Number.MAX_SAFE_INTEGER
        ? `${name} must be an integer >= ${min}, got ${value}`
        : `${name} must be an integer between ${min} and ${max}, got ${value}`,
    );
  }
}

function collectProblems(config: SsoConfig): string[] {
  const problems: string[] = [];

  if (!config.baseUrl) {
    problems.push("Base URL is required (SSO_BASE_URL)");
  } else if (!isHttpUrl(config.baseUrl)) {
    problems.push(`Invalid base URL: ${config.baseUrl}`);
  }

  if (!config.clientId) {
    problems.push("Client ID is required (SSO_CLIENT_ID)");
  }

  if (!config.redirectUri) {
    problems.push("Redirect URI is required (SSO_REDIRECT_URI)");
  } else if (!isHttpUrl(config.redirectUri)) {
    problems.push(`Invalid redirect URI: ${config.redirectUri}`);
  }

  if (config.scopes.length === 0) {
    problems.push("At least one scope is required (SSO_SCOPES)");
  }

  for (const [name, path] of Object.entries(config.endpoints)) {
    if (!path.startsWith("/")) {
      problems.push(`Endpoint path "${name}" must start with "/", got "${path}"`);
    }
  }

  checkInteger(problems, "security.stateLength", config.security.stateLength, 32);
  checkInteger(problems, "security.codeVerifierLength", config.security.codeVerifierLength, 43, 128);
  checkInteger(problems, "session.lifetimeMinutes", config.session.lifetimeMinutes, 1);
  checkInteger(problems, "http.timeoutMs", config.http.timeoutMs, 1);
  checkInteger(problems, "http.connectTimeoutMs", config.http.connectTimeoutMs, 1);
  checkInteger(problems, "http.retryAttempts", config.http.retryAttempts, 1);
  checkInteger(problems, "http.retryDelayMs", config.http.retryDelayMs, 0);
  checkInteger(problems, "cache.discoveryTtlSeconds", config.cache.discoveryTtlSeconds, 1);
  checkInteger(problems, "cache.jwksTtlSeconds", config.cache.jwksTtlSeconds, 1);

  return problems;
}

/**
 * Validates an already-built configuration
 */
export function validateConfig(config: SsoConfig): void {
  const problems = collectProblems(config);
  if (!isChallengeMethod(config.security.codeChallengeMethod)) {
    problems.push(`Unsupported code challenge method "${config.security.codeChallengeMethod}"`);
  }
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
}

/**
 * Gets a safe (redacted) version of the config for logging
 */
export function getSafeConfig(config: SsoConfig): Record<string, unknown> {
  return redactSensitiveData(config);
}

/**
 * Logs a one-line summary plus the redacted configuration
 */
export function logConfigSummary(config: SsoConfig, logger: Logger): void {
  logger.info(`Provider: ${config.baseUrl}`);
  logger.info(`Client: ${config.clientId} (${config.clientSecret ? "confidential" : "public"})`);
  if (!config.security.verifyTls) {
    logger.warn("TLS certificate verification is disabled");
  }
  if (config.security.codeChallengeMethod === "plain") {
    logger.warn("PKCE method \"plain\" is in use; prefer S256");
  }
  logger.debug("Configuration loaded", getSafeConfig(config));
}
