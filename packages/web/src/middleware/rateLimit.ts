/**
 * Rate limiting middleware for Hono
 *
 * Uses an Upstash sliding window when Redis is configured. The in-memory
 * fixed window is for development and single-instance deployments only.
 */

import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";
import { errorMessage, silentLogger, type Logger } from "@sso-bridge/core";
import type { Context, Next } from "hono";
import type { RedisConfig } from "../config.js";

export interface RateLimitDecision {
    success: boolean;
    limit: number;
    remaining: number;
    /** Epoch ms at which the window resets */
    reset: number;
}

export interface RateLimitBackend {
    limit(identifier: string): Promise<RateLimitDecision>;
}

interface RateLimitEntry {
    count: number;
    resetTime: number;
}

export interface MemoryRateLimitOptions {
    /** Time window in milliseconds (default: 60000 = 1 minute) */
    windowMs?: number;
    /** Maximum requests per window (default: 100) */
    max?: number;
    now?: () => number;
}

export class MemoryRateLimit implements RateLimitBackend {
    private readonly store = new Map<string, RateLimitEntry>();
    private readonly windowMs: number;
    private readonly max: number;
    private readonly now: () => number;

    constructor(options: MemoryRateLimitOptions = {}) {
        this.windowMs = options.windowMs ?? 60 * 1000;
        this.max = options.max ?? 100;
        this.now = options.now ?? Date.now;

        const cleanupInterval = setInterval(() => this.cleanup(), this.windowMs);
        // Ensure cleanup doesn't prevent process exit
        cleanupInterval.unref();
    }

    async limit(identifier: string): Promise<RateLimitDecision> {
        const now = this.now();
        let entry = this.store.get(identifier);

        if (!entry || now > entry.resetTime) {
            entry = { count: 0, resetTime: now + this.windowMs };
        }
        entry.count++;
        this.store.set(identifier, entry);

        return {
            success: entry.count <= this.max,
            limit: this.max,
            remaining: Math.max(0, this.max - entry.count),
            reset: entry.resetTime,
        };
    }

    private cleanup(): void {
        const now = this.now();
        for (const [key, entry] of this.store.entries()) {
            if (now > entry.resetTime) {
                this.store.delete(key);
            }
        }
    }
}

/**
 * Sliding window limiter shared by every instance through Upstash Redis
 */
export function upstashRateLimit(
    config: RedisConfig,
    max: number = 100,
    windowSeconds: number = 60,
): RateLimitBackend {
    return new Ratelimit({
        redis: new Redis({ url: config.url, token: config.token }),
        limiter: Ratelimit.slidingWindow(max, `${windowSeconds} s`),
        prefix: "ratelimit:sso",
    });
}

/**
 * Client IP from proxy headers
 */
export function getClientIdentifier(c: Context): string {
    const ip =
        c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
        c.req.header("x-real-ip") ||
        c.req.header("cf-connecting-ip") ||
        "anonymous";

    return `ip:${ip}`;
}

export interface RateLimiterOptions {
    backend: RateLimitBackend;
    keyGenerator?: (c: Context) => string;
    skip?: (c: Context) => boolean;
    logger?: Logger;
    now?: () => number;
}

/**
 * Returns 429 Too Many Requests once the backend rejects a client
 *
 * A failing backend lets requests through.
 */
export function rateLimiter(options: RateLimiterOptions) {
    const {
        backend,
        keyGenerator = getClientIdentifier,
        skip,
        logger = silentLogger,
        now = Date.now,
    } = options;

    return async (c: Context, next: Next) => {
        if (skip?.(c)) {
            return next();
        }

        let decision: RateLimitDecision;
        try {
            decision = await backend.limit(keyGenerator(c));
        } catch (error) {
            logger.error("Error checking rate limit", { error: errorMessage(error) });
            return next();
        }

        const resetSeconds = Math.max(0, Math.ceil((decision.reset - now()) / 1000));

        c.header("X-RateLimit-Limit", String(decision.limit));
        c.header("X-RateLimit-Remaining", String(decision.remaining));
        c.header("X-RateLimit-Reset", String(resetSeconds));

        if (!decision.success) {
            c.header("Retry-After", String(resetSeconds));
            return c.json(
                {
                    error: "too_many_requests",
                    error_description: "Rate limit exceeded. Please try again later.",
                    retry_after: resetSeconds,
                },
                429,
            );
        }

        return next();
    };
}
