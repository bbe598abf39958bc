/**
 * OAuth 2.0 / OpenID Connect client core
 */

export {
  SsoClient,
  type AuthPhase,
  type LogoutResult,
  type RedirectOptions,
  type SsoContext,
} from "./client.js";
export { systemClock, type Clock } from "./clock.js";
export {
  CHALLENGE_METHODS,
  DEFAULT_CACHE,
  DEFAULT_ENDPOINTS,
  DEFAULT_HTTP,
  DEFAULT_LOGGING,
  DEFAULT_SCOPES,
  DEFAULT_SECURITY,
  DEFAULT_SESSION,
  getSafeConfig,
  isChallengeMethod,
  loadConfig,
  logConfigSummary,
  parseScopes,
  readEnv,
  resolveConfig,
  validateConfig,
  type CacheConfig,
  type ChallengeMethod,
  type EndpointPaths,
  type HttpConfig,
  type LoggingConfig,
  type SecurityConfig,
  type SessionConfig,
  type SsoConfig,
  type SsoConfigInput,
} from "./config.js";
export { safeEqual, sha256Hex } from "./crypto.js";
export * from "./errors.js";
export {
  FetchTransport,
  isRetryableStatus,
  type FetchLike,
  type FetchResponseLike,
  type FetchTransportOptions,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "./http/transport.js";
export { isRecord, parseJson } from "./json.js";
export {
  createConsoleLogger,
  isLogLevel,
  LOG_LEVELS,
  silentLogger,
  type LogContext,
  type Logger,
  type LogLevel,
} from "./logger.js";
export {
  DiscoveryCache,
  discoveryDocumentSchema,
  type DiscoveryDocument,
  type EndpointName,
} from "./oauth/discovery.js";
export { IdTokenValidator } from "./oauth/id-token.js";
export {
  createPkcePair,
  generateCodeChallenge,
  generateCodeVerifier,
  MAX_VERIFIER_LENGTH,
  MIN_VERIFIER_LENGTH,
  validateCodeVerifier,
  verifyCodeChallenge,
} from "./oauth/pkce.js";
export {
  encodeLaunchTokenState,
  MIN_STATE_LENGTH,
  parseLaunchTokenState,
  StateStore,
} from "./oauth/state.js";
export {
  DEFAULT_EXPIRES_IN,
  MAX_EXPIRES_IN,
  parseOAuthError,
  TokenExchanger,
} from "./oauth/token.js";
export { TokenStore } from "./oauth/token-store.js";
export type * from "./oauth/types.js";
export { isSensitiveKey, redactSensitiveData } from "./redact.js";
export * from "./store/index.js";
