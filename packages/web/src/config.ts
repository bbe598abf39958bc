/**
 * Configuration module for the SSO web adapter
 */

import {
  ConfigurationError,
  getSafeConfig,
  parseJson,
  readEnv,
  redactSensitiveData,
  resolveConfig,
  type Logger,
  type SsoConfig,
} from "@sso-bridge/core";
import {
  DEFAULT_FIELD_MAPPINGS,
  fieldMappingsSchema,
  parseFieldMappings,
  type FieldMappings,
} from "./profile.js";

export interface ServerConfig {
  host: string;
  port: number;
}

export interface RouteConfig {
  /** Mount point of login, callback and logout */
  prefix: string;
  redirectAfterLogin: string;
  /** Where a failed login lands, with `?error=` */
  fallbackLoginPath: string;
  redirectAfterLogout: string;
}

export interface WebSessionConfig {
  cookieName: string;
  ttlSeconds: number;
  /** Mark the session cookie Secure */
  secureCookie: boolean;
}

export interface RedisConfig {
  url: string;
  token: string;
}

export interface WebConfig {
  server: ServerConfig;
  routes: RouteConfig;
  session: WebSessionConfig;
  /** 64 hex chars; enables encryption of session data at rest */
  encryptionKey?: string;
  fieldMappings: FieldMappings;
  redis?: RedisConfig;
  sso: SsoConfig;
}

export const DEFAULT_ROUTES: RouteConfig = {
  prefix: "/auth/sso",
  redirectAfterLogin: "/dashboard",
  fallbackLoginPath: "/login",
  redirectAfterLogout: "/",
};

export const DEFAULT_SESSION_TTL_SECONDS = 8 * 60 * 60;

const ENCRYPTION_KEY_PATTERN = /^[0-9a-fA-F]{64}$/;

function stripTrailingSlash(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, "") : path;
}

function parseFieldMappingsEnv(value: string | undefined, problems: string[]): FieldMappings {
  if (!value) return DEFAULT_FIELD_MAPPINGS;

  const parsed = fieldMappingsSchema.safeParse(parseJson(value));
  if (!parsed.success) {
    problems.push("SSO_FIELD_MAPPINGS must be a JSON object of non-empty string arrays");
    return DEFAULT_FIELD_MAPPINGS;
  }

  try {
    return parseFieldMappings(parsed.data);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    problems.push(...error.problems.map((problem) => `SSO_FIELD_MAPPINGS: ${problem}`));
    return DEFAULT_FIELD_MAPPINGS;
  }
}

/**
 * Loads configuration from environment variables
 *
 * Every problem found, in the core settings and the web ones, is reported
 * in a single ConfigurationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WebConfig {
  const problems: string[] = [];

  let sso: SsoConfig | undefined;
  try {
    sso = resolveConfig(readEnv(env));
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    problems.push(...error.problems);
  }

  const port = Number(env.PORT || "3000");
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    problems.push(`PORT must be an integer between 1 and 65535, got "${env.PORT}"`);
  }

  const routes: RouteConfig = {
    prefix: stripTrailingSlash(env.SSO_ROUTES_PREFIX || DEFAULT_ROUTES.prefix),
    redirectAfterLogin: env.SSO_REDIRECT_AFTER_LOGIN || DEFAULT_ROUTES.redirectAfterLogin,
    fallbackLoginPath: env.SSO_FALLBACK_LOGIN_PATH || DEFAULT_ROUTES.fallbackLoginPath,
    redirectAfterLogout: env.SSO_REDIRECT_AFTER_LOGOUT || DEFAULT_ROUTES.redirectAfterLogout,
  };
  for (const [name, path] of Object.entries(routes)) {
    if (!path.startsWith("/")) {
      problems.push(`routes.${name} must start with "/"`);
    }
  }

  const ttlSeconds = Number(env.SSO_WEB_SESSION_TTL || DEFAULT_SESSION_TTL_SECONDS);
  if (!Number.isInteger(ttlSeconds) || ttlSeconds < 60) {
    problems.push("SSO_WEB_SESSION_TTL must be an integer of at least 60 seconds");
  }

  const encryptionKey = env.SSO_ENCRYPTION_KEY || undefined;
  if (encryptionKey && !ENCRYPTION_KEY_PATTERN.test(encryptionKey)) {
    problems.push("SSO_ENCRYPTION_KEY must be exactly 64 hex characters (32 bytes)");
  }

  const fieldMappings = parseFieldMappingsEnv(env.SSO_FIELD_MAPPINGS, problems);

  const redisUrl = env.UPSTASH_REDIS_REST_URL;
  const redisToken = env.UPSTASH_REDIS_REST_TOKEN;
  if (Boolean(redisUrl) !== Boolean(redisToken)) {
    problems.push("UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together");
  }

  if (problems.length > 0 || !sso) {
    throw new ConfigurationError(problems);
  }

  return {
    server: {
      host: env.HOST || "0.0.0.0",
      port,
    },
    routes,
    session: {
      cookieName: env.SSO_SESSION_COOKIE || "sso_session",
      ttlSeconds,
      secureCookie: env.NODE_ENV === "production",
    },
    encryptionKey,
    fieldMappings,
    redis: redisUrl && redisToken ? { url: redisUrl, token: redisToken } : undefined,
    sso,
  };
}

/**
 * Gets a safe (redacted) version of the config for logging
 */
export function getSafeWebConfig(config: WebConfig): Record<string, unknown> {
  const { sso, ...web } = config;
  return { ...redactSensitiveData(web), sso: getSafeConfig(sso) };
}

export function logWebConfigSummary(config: WebConfig, logger: Logger): void {
  logger.info(`Routes mounted at ${config.routes.prefix}`);
  logger.info(`Session store: ${config.redis ? "Upstash Redis" : "in-memory"}`);
  if (!config.encryptionKey) {
    logger.warn("SSO_ENCRYPTION_KEY not set, session data is stored unencrypted");
  }
  logger.debug("Web configuration loaded", getSafeWebConfig(config));
}
