/**
 * Hono adapter for the SSO client core
 */

export { createApp, safeRedirectPath } from "./app.js";
export {
  DEFAULT_ROUTES,
  DEFAULT_SESSION_TTL_SECONDS,
  getSafeWebConfig,
  loadConfig,
  logWebConfigSummary,
  type RedisConfig,
  type RouteConfig,
  type ServerConfig,
  type WebConfig,
  type WebSessionConfig,
} from "./config.js";
export {
  redirectIfAuthenticated,
  regenerateSession,
  requireSso,
  resolveProfile,
  ssoSession,
  wantsJson,
  type SsoRuntime,
} from "./middleware/auth.js";
export {
  getClientIdentifier,
  MemoryRateLimit,
  rateLimiter,
  upstashRateLimit,
  type RateLimitBackend,
  type RateLimitDecision,
} from "./middleware/rateLimit.js";
export { httpsEnforcement, requestId, securityHeaders } from "./middleware/security.js";
export {
  DEFAULT_FIELD_MAPPINGS,
  DERIVED_VALUES,
  deriveValue,
  mapClaims,
  parseClaimSource,
  parseFieldMappings,
  type ClaimSource,
  type Claims,
  type DerivedValue,
  type FieldMappings,
  type UserProfile,
} from "./profile.js";
export { generateSessionId, isSessionId, sessionStore, WebSession } from "./session.js";
export { createStores, UpstashStore, type Stores } from "./store/index.js";
