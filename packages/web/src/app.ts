/**
 * SSO web adapter
 *
 * Hosts the client core behind three routes:
 *
 * 1. GET  {prefix}/login    -> 302 to the identity provider
 * 2. GET  {prefix}/callback -> code exchange, profile mapping, 302 back into the app
 * 3. POST {prefix}/logout   -> revocation, session teardown, 302 to the provider logout
 *
 * plus /health and a guarded /me that returns the session profile.
 */

import {
  errorMessage,
  FetchTransport,
  toSafeMessage,
  UserInfoError,
  type SsoClient,
  type TokenSet,
  type UserInfoClaims,
} from "@sso-bridge/core";
import { Hono, type Context } from "hono";
import { csrf } from "hono/csrf";
import { HTTPException } from "hono/http-exception";
import { logger as requestLogger } from "hono/logger";
import {
  regenerateSession,
  requireSso,
  ssoSession,
  type SsoRuntime,
} from "./middleware/auth.js";
import { MemoryRateLimit, rateLimiter, upstashRateLimit } from "./middleware/rateLimit.js";
import { httpsEnforcement, requestId, securityHeaders } from "./middleware/security.js";
import { mapClaims, type Claims } from "./profile.js";

const VERSION = "0.1.0";

/**
 * Accepts same-origin paths only ("/x", not "//host" or "https://host")
 */
export function safeRedirectPath(value: string | null | undefined): string | null {
  if (!value || !value.startsWith("/") || value.startsWith("//") || value.startsWith("/\\")) {
    return null;
  }
  return value;
}

/**
 * Claims from the verified ID token, overlaid with userinfo
 *
 * Userinfo is optional when an ID token is present. When both carry a
 * subject they must agree.
 */
async function collectClaims(
  client: SsoClient,
  tokens: TokenSet,
  runtime: SsoRuntime,
): Promise<Claims> {
  const idClaims = tokens.idToken ? await client.validateIdToken(tokens.idToken) : null;

  let userInfo: UserInfoClaims = {};
  try {
    userInfo = await client.getUserInfo();
  } catch (error) {
    if (!idClaims) throw error;
    runtime.logger.warn("Userinfo unavailable, using ID token claims only", {
      error: errorMessage(error),
    });
  }

  if (idClaims?.sub !== undefined && userInfo.sub !== undefined && userInfo.sub !== idClaims.sub) {
    throw new UserInfoError("Userinfo subject does not match the ID token");
  }

  const claims: Claims = { ...idClaims, ...userInfo };
  if (typeof claims.sub !== "string" || claims.sub === "") {
    throw new UserInfoError("Provider returned no subject claim");
  }
  return claims;
}

export function createApp(options: SsoRuntime): Hono {
  // Every request's client shares one transport and its connection pool
  const runtime: SsoRuntime = {
    ...options,
    transport:
      options.transport ??
      FetchTransport.fromConfig(options.config.sso, { logger: options.logger.child("http") }),
  };
  const { config } = runtime;
  const prefix = config.routes.prefix;
  const log = runtime.logger.child("web");

  const app = new Hono();

  // ============================================================
  // Middleware
  // ============================================================

  app.use("*", requestId());
  app.use("*", httpsEnforcement());
  app.use("*", securityHeaders({ noStorePrefixes: [prefix, "/me"] }));
  app.use(
    "*",
    requestLogger((message, ...rest) => log.info([message, ...rest].join(" "))),
  );

  const rateLimit =
    runtime.rateLimit ??
    (config.redis ? upstashRateLimit(config.redis) : new MemoryRateLimit());
  app.use(`${prefix}/*`, rateLimiter({ backend: rateLimit, logger: log }));

  app.use(`${prefix}/*`, ssoSession(runtime));
  app.use("/me", ssoSession(runtime));
  app.use(`${prefix}/logout`, csrf());

  const failLogin = async (c: Context, error: unknown) => {
    log.warn("SSO login failed", {
      error: errorMessage(error),
      requestId: c.get("requestId"),
    });

    await c.get("sso").logout();
    await c.get("session").destroy();

    const target = new URL(config.routes.fallbackLoginPath, c.req.url);
    target.searchParams.set("error", toSafeMessage(error));
    return c.redirect(`${target.pathname}${target.search}`);
  };

  // ============================================================
  // General Endpoints
  // ============================================================

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      version: VERSION,
    });
  });

  app.get("/me", requireSso(runtime), (c) => {
    return c.json(c.get("profile"));
  });

  // ============================================================
  // SSO Routes
  // ============================================================

  app.get(`${prefix}/login`, async (c) => {
    try {
      const url = await c.get("sso").redirect({
        prompt: c.req.query("prompt"),
        loginHint: c.req.query("login_hint"),
      });
      return c.redirect(url);
    } catch (error) {
      return failLogin(c, error);
    }
  });

  app.get(`${prefix}/callback`, async (c) => {
    const result = await c.get("sso").handleCallback({
      code: c.req.query("code"),
      state: c.req.query("state"),
      error: c.req.query("error"),
      errorDescription: c.req.query("error_description"),
    });

    if (!result.ok) {
      return failLogin(c, result.error);
    }

    try {
      const claims = await collectClaims(c.get("sso"), result.value, runtime);
      const profile = mapClaims(claims, config.fieldMappings);

      const session = await regenerateSession(c, runtime);
      await session.setProfile(profile);

      const intended = safeRedirectPath(await session.pullIntendedUrl());
      return c.redirect(intended ?? config.routes.redirectAfterLogin);
    } catch (error) {
      return failLogin(c, error);
    }
  });

  app.post(`${prefix}/logout`, async (c) => {
    const client = c.get("sso");
    const { revoked } = await client.logout();
    await c.get("session").destroy();

    if (!revoked) {
      log.warn("Logged out locally; token revocation failed", {
        requestId: c.get("requestId"),
      });
    }

    const postLogout =
      safeRedirectPath(c.req.query("redirect")) ?? config.routes.redirectAfterLogout;
    return c.redirect(client.getLogoutUrl(new URL(postLogout, c.req.url).toString()));
  });

  // ============================================================
  // Errors
  // ============================================================

  app.notFound((c) => {
    return c.json(
      {
        error: "Not Found",
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
      404,
    );
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    log.error("Server error", {
      error: err.message,
      requestId: c.get("requestId"),
    });
    return c.json({ error: "Internal Server Error", requestId: c.get("requestId") }, 500);
  });

  return app;
}
