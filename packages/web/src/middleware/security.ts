/**
 * Security middleware for the SSO web adapter
 */

import { randomBytes } from "crypto";
import type { Context, Next } from "hono";

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}

export interface HttpsEnforcementOptions {
  /** Defaults to NODE_ENV === "production" */
  enabled?: boolean;
}

/**
 * Middleware to enforce HTTPS
 *
 * Redirects requests that a proxy reports as plain HTTP. Left off in
 * development for local testing.
 */
export function httpsEnforcement(options: HttpsEnforcementOptions = {}) {
  const enabled = options.enabled ?? process.env.NODE_ENV === "production";

  return async (c: Context, next: Next) => {
    if (!enabled) {
      return next();
    }

    const proto = c.req.header("x-forwarded-proto");

    if (proto && proto !== "https") {
      const url = new URL(c.req.url);
      const host = c.req.header("host") ?? url.host;
      return c.redirect(`https://${host}${url.pathname}${url.search}`, 301);
    }

    return next();
  };
}

export interface SecurityHeadersOptions {
  /** Responses under these path prefixes are marked `Cache-Control: no-store` */
  noStorePrefixes?: string[];
}

/**
 * Adds common security headers to responses
 */
export function securityHeaders(options: SecurityHeadersOptions = {}) {
  const noStorePrefixes = options.noStorePrefixes ?? [];

  return async (c: Context, next: Next) => {
    await next();

    c.header("X-Content-Type-Options", "nosniff");
    c.header("X-Frame-Options", "DENY");
    c.header("X-XSS-Protection", "1; mode=block");
    // The callback URL carries the authorization code; keep it out of Referer
    c.header("Referrer-Policy", "no-referrer");

    if (noStorePrefixes.some((prefix) => c.req.path.startsWith(prefix))) {
      c.header("Cache-Control", "no-store");
    }
  };
}

/**
 * Request ID middleware for audit logging
 */
export function requestId() {
  return async (c: Context, next: Next) => {
    const id = c.req.header("x-request-id") || `req_${Date.now()}_${randomBytes(4).toString("hex")}`;

    c.set("requestId", id);
    c.header("X-Request-ID", id);

    return next();
  };
}
