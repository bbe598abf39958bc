/**
 * SSO session and authentication middleware for Hono
 */

import {
    errorMessage,
    SsoClient,
    type Clock,
    type HttpTransport,
    type Logger,
} from "@sso-bridge/core";
import type { Context, Next } from "hono";
import { getCookie, setCookie } from "hono/cookie";
import type { WebConfig } from "../config.js";
import type { RateLimitBackend } from "./rateLimit.js";
import { mapClaims, type UserProfile } from "../profile.js";
import { generateSessionId, isSessionId, sessionStore, WebSession } from "../session.js";
import type { Stores } from "../store/index.js";

// Extend Hono context with the session and its client
declare module "hono" {
    interface ContextVariableMap {
        session: WebSession;
        sso: SsoClient;
        profile: UserProfile;
    }
}

/**
 * What the middlewares and routes share for the lifetime of the app
 */
export interface SsoRuntime {
    config: WebConfig;
    stores: Stores;
    logger: Logger;
    /** Shared by all requests; createApp builds one from the core configuration when unset */
    transport?: HttpTransport;
    clock?: Clock;
    /** Defaults to Upstash when Redis is configured, in-memory otherwise */
    rateLimit?: RateLimitBackend;
}

function openSession(runtime: SsoRuntime, id: string): WebSession {
    return new WebSession(
        id,
        sessionStore(runtime.stores.sessions, id, {
            ttlSeconds: runtime.config.session.ttlSeconds,
            encryptionKey: runtime.config.encryptionKey,
        }),
    );
}

function bindSession(c: Context, runtime: SsoRuntime, session: WebSession): void {
    const { session: sessionConfig } = runtime.config;

    setCookie(c, sessionConfig.cookieName, session.id, {
        path: "/",
        httpOnly: true,
        secure: sessionConfig.secureCookie,
        sameSite: "Lax",
        maxAge: sessionConfig.ttlSeconds,
    });

    c.set("session", session);
    c.set(
        "sso",
        new SsoClient({
            config: runtime.config.sso,
            sessionStore: session.store,
            cache: runtime.stores.cache,
            transport: runtime.transport,
            clock: runtime.clock,
            logger: runtime.logger,
            signal: c.req.raw.signal,
        }),
    );
}

/**
 * Attaches the cookie session and a per-request SsoClient to the context
 *
 * The client carries the request's abort signal, so provider calls stop
 * when the browser goes away.
 */
export function ssoSession(runtime: SsoRuntime) {
    return async (c: Context, next: Next) => {
        const cookie = getCookie(c, runtime.config.session.cookieName);
        const id = isSessionId(cookie) ? cookie : generateSessionId();

        bindSession(c, runtime, openSession(runtime, id));
        await next();
    };
}

/**
 * Moves the session's data under a fresh id (after login, against fixation)
 */
export async function regenerateSession(c: Context, runtime: SsoRuntime): Promise<WebSession> {
    const current = c.get("session");
    const fresh = openSession(runtime, generateSessionId());

    for (const key of await current.store.keys("")) {
        const value = await current.store.get(key);
        if (value !== null) {
            await fresh.store.put(key, value);
        }
    }
    await current.destroy();

    bindSession(c, runtime, fresh);
    return fresh;
}

/**
 * The session's profile, rebuilt from userinfo when tokens exist but the
 * profile does not
 *
 * Tokens the provider no longer accepts are dropped by logging out.
 */
export async function resolveProfile(c: Context, runtime: SsoRuntime): Promise<UserProfile | null> {
    const session = c.get("session");
    const client = c.get("sso");

    if (!(await client.isAuthenticated())) {
        return null;
    }

    const stored = await session.getProfile();
    if (stored) {
        return stored;
    }

    try {
        const profile = mapClaims(await client.getUserInfo(), runtime.config.fieldMappings);
        await session.setProfile(profile);
        return profile;
    } catch (error) {
        runtime.logger.warn("Could not restore profile, clearing SSO session", {
            error: errorMessage(error),
        });
        await client.logout();
        return null;
    }
}

/**
 * JSON clients get a 401 instead of a redirect
 */
export function wantsJson(c: Context): boolean {
    const accept = c.req.header("accept") ?? "";
    return (
        accept.includes("application/json") ||
        c.req.header("x-requested-with") === "XMLHttpRequest"
    );
}

/**
 * Requires an authenticated SSO session
 *
 * Browsers are sent through the login route, with the requested URL
 * remembered for the return trip.
 */
export function requireSso(runtime: SsoRuntime) {
    return async (c: Context, next: Next) => {
        const profile = await resolveProfile(c, runtime);
        if (profile) {
            c.set("profile", profile);
            await next();
            return;
        }

        if (wantsJson(c)) {
            return c.json(
                {
                    error: "unauthenticated",
                    error_description: "Authentication required",
                },
                401,
            );
        }

        const url = new URL(c.req.url);
        await c.get("session").rememberIntendedUrl(`${url.pathname}${url.search}`);
        return c.redirect(`${runtime.config.routes.prefix}/login`);
    };
}

/**
 * Sends signed-in users away from guest-only pages
 */
export function redirectIfAuthenticated(runtime: SsoRuntime, redirectTo?: string) {
    return async (c: Context, next: Next) => {
        if (await resolveProfile(c, runtime)) {
            return c.redirect(redirectTo ?? runtime.config.routes.redirectAfterLogin);
        }
        await next();
    };
}
