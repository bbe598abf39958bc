/**
 * Error types for the SSO client core
 *
 * Every failure the core reports is an SsoError subclass with a stable
 * machine-readable `code`. Low-level transport failures are wrapped by the
 * component that made the call before they reach the caller.
 */

export interface SsoErrorOptions {
  cause?: unknown;
}

/**
 * Base class for all SSO client errors
 */
export class SsoError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options: SsoErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "SsoError";
    this.code = code;
  }
}

/**
 * Missing or malformed configuration; the client refuses to start
 */
export class ConfigurationError extends SsoError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Configuration validation failed:\n${problems.map((p) => `  - ${p}`).join("\n")}`,
      "configuration_error",
    );
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

export class InvalidParameterError extends SsoError {
  constructor(message: string) {
    super(message, "invalid_parameter");
    this.name = "InvalidParameterError";
  }
}

export class UnsupportedMethodError extends SsoError {
  public readonly method: string;

  constructor(method: string) {
    super(`Unsupported code challenge method: ${method}`, "unsupported_method");
    this.name = "UnsupportedMethodError";
    this.method = method;
  }
}

/**
 * Provider metadata could not be fetched or failed validation
 */
export class DiscoveryError extends SsoError {
  public readonly status?: number;

  constructor(
    message: string,
    options: SsoErrorOptions & { status?: number } = {},
  ) {
    super(message, "discovery_failed", options);
    this.name = "DiscoveryError";
    this.status = options.status;
  }
}

export class EndpointNotFoundError extends SsoError {
  public readonly endpoint: string;

  constructor(endpoint: string) {
    super(
      `Endpoint "${endpoint}" is not advertised by the provider`,
      "endpoint_not_found",
    );
    this.name = "EndpointNotFoundError";
    this.endpoint = endpoint;
  }
}

/**
 * Missing, expired or mismatched CSRF state. Always terminal for a callback.
 */
export class StateError extends SsoError {
  constructor(message: string) {
    super(message, "invalid_state");
    this.name = "StateError";
  }
}

/**
 * The identity provider answered the authorization request with an error
 */
export class AuthorizationError extends SsoError {
  public readonly error: string;
  public readonly errorDescription?: string;

  constructor(error: string, errorDescription?: string) {
    super(
      errorDescription
        ? `Authorization failed: ${error}: ${errorDescription}`
        : `Authorization failed: ${error}`,
      error,
    );
    this.name = "AuthorizationError";
    this.error = error;
    this.errorDescription = errorDescription;
  }
}

export type TokenOperation = "exchange" | "refresh";

export interface TokenExchangeErrorOptions extends SsoErrorOptions {
  operation: TokenOperation;
  status?: number;
  error?: string;
  errorDescription?: string;
  code?: string;
}

/**
 * Non-2xx or structurally invalid response from the token endpoint
 */
export class TokenExchangeError extends SsoError {
  public readonly operation: TokenOperation;
  public readonly status?: number;
  public readonly error?: string;
  public readonly errorDescription?: string;

  constructor(message: string, options: TokenExchangeErrorOptions) {
    super(
      message,
      options.code ?? options.error ?? "token_exchange_failed",
      options,
    );
    this.name = "TokenExchangeError";
    this.operation = options.operation;
    this.status = options.status;
    this.error = options.error;
    this.errorDescription = options.errorDescription;
  }
}

export class TokenValidationError extends SsoError {
  /** Underlying verifier code, e.g. ERR_JWT_EXPIRED */
  public readonly reason?: string;

  constructor(message: string, options: SsoErrorOptions & { reason?: string } = {}) {
    super(message, "invalid_id_token", options);
    this.name = "TokenValidationError";
    this.reason = options.reason;
  }
}

/**
 * Reported through the logger only; revocation never fails the caller
 */
export class RevocationError extends SsoError {
  public readonly status?: number;

  constructor(message: string, options: SsoErrorOptions & { status?: number } = {}) {
    super(message, "revocation_failed", options);
    this.name = "RevocationError";
    this.status = options.status;
  }
}

export class UserInfoError extends SsoError {
  public readonly status?: number;

  constructor(message: string, options: SsoErrorOptions & { status?: number } = {}) {
    super(message, "userinfo_failed", options);
    this.name = "UserInfoError";
    this.status = options.status;
  }
}

/**
 * No usable tokens: never logged in, or expired without a refresh token
 */
export class AuthenticationRequiredError extends SsoError {
  constructor(message: string) {
    super(message, "authentication_required");
    this.name = "AuthenticationRequiredError";
  }
}

export type TransportFailureReason = "timeout" | "aborted" | "network";

export class TransportError extends SsoError {
  public readonly reason: TransportFailureReason;
  public readonly url: string;

  constructor(
    message: string,
    reason: TransportFailureReason,
    url: string,
    options: SsoErrorOptions = {},
  ) {
    super(message, "transport_error", options);
    this.name = "TransportError";
    this.reason = reason;
    this.url = url;
  }
}

/**
 * Wraps anything thrown into an SsoError, keeping SsoErrors as they are
 */
export function toSsoError(error: unknown, fallbackMessage: string): SsoError {
  if (error instanceof SsoError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new SsoError(`${fallbackMessage}: ${detail}`, "unexpected_error", {
    cause: error,
  });
}

/**
 * Message that is safe to show an end user after a failed login
 *
 * Only the identity provider's own error code and description are echoed.
 */
export function toSafeMessage(error: unknown): string {
  if (error instanceof AuthorizationError) {
    return error.errorDescription ?? `Authorization failed (${error.error})`;
  }
  if (error instanceof StateError) {
    return "Your login session is invalid or has expired. Please try again.";
  }
  if (error instanceof TokenExchangeError && error.error) {
    return error.errorDescription
      ? `Sign-in was rejected: ${error.errorDescription}`
      : `Sign-in was rejected (${error.error})`;
  }
  if (error instanceof DiscoveryError || error instanceof TransportError) {
    return "The identity provider is currently unavailable. Please try again later.";
  }
  return "Authentication failed. Please try again.";
}

/**
 * Extracts a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
