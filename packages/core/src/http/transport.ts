/**
 * HTTP transport used for every call to the identity provider
 *
 * Each attempt is bounded by a request timeout (AbortController) and a
 * connect timeout (undici Agent). Transient failures are retried a fixed
 * number of times with a fixed delay between attempts.
 */

import { Agent, fetch as undiciFetch } from "undici";
import type { SsoConfig } from "../config.js";
import { errorMessage, TransportError } from "../errors.js";
import { parseJson } from "../json.js";
import { silentLogger, type Logger } from "../logger.js";

export type HttpMethod = "GET" | "POST";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Raw response body */
  text: string;
  /** Parsed JSON body, or null when the body is not JSON */
  body: unknown;
}

export interface HttpTransport {
  send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse>;
}

export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface FetchResponseLike {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface FetchTransportOptions {
  timeoutMs?: number;
  connectTimeoutMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
  verifyTls?: boolean;
  /** Replaces the undici-backed fetch (used by tests) */
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Request timeout, rate limiting and server errors are worth another attempt
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * fetch bound to an undici Agent carrying the connect timeout and TLS setting
 */
export function createUndiciFetch(connectTimeoutMs: number, verifyTls: boolean): FetchLike {
  const dispatcher = new Agent({
    connect: {
      timeout: connectTimeoutMs,
      rejectUnauthorized: verifyTls,
    },
  });

  return (url, init) =>
    undiciFetch(url, {
      method: init.method,
      headers: init.headers,
      body: init.body,
      signal: init.signal,
      dispatcher,
    });
}

export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
    this.fetchImpl =
      options.fetchImpl ??
      createUndiciFetch(options.connectTimeoutMs ?? 10_000, options.verifyTls ?? true);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Builds a transport from the client's http and security settings
   */
  static fromConfig(
    config: SsoConfig,
    overrides: Pick<FetchTransportOptions, "fetchImpl" | "sleep" | "logger"> = {},
  ): FetchTransport {
    return new FetchTransport({
      timeoutMs: config.http.timeoutMs,
      connectTimeoutMs: config.http.connectTimeoutMs,
      retryAttempts: config.http.retryAttempts,
      retryDelayMs: config.http.retryDelayMs,
      verifyTls: config.security.verifyTls,
      ...overrides,
    });
  }

  async send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      if (signal?.aborted) {
        throw new TransportError(`Request to ${request.url} was aborted`, "aborted", request.url);
      }

      const isLast = attempt === this.retryAttempts;

      try {
        const response = await this.attempt(request, signal);

        if (!isLast && isRetryableStatus(response.status)) {
          this.logger.warn(`HTTP ${response.status} from ${request.url}, retrying`, {
            attempt,
            maxAttempts: this.retryAttempts,
          });
          await this.sleep(this.retryDelayMs);
          continue;
        }

        return response;
      } catch (error) {
        if (!(error instanceof TransportError) || error.reason === "aborted" || isLast) {
          throw error;
        }

        this.logger.warn(`${error.message}, retrying`, {
          attempt,
          maxAttempts: this.retryAttempts,
        });
        await this.sleep(this.retryDelayMs);
      }
    }

    throw new TransportError(
      `Request to ${request.url} failed after ${this.retryAttempts} attempts`,
      "network",
      request.url,
    );
  }

  /**
   * Performs a single attempt
   */
  private async attempt(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    const headers: Record<string, string> = {
      Accept: "application/json",
      ...request.headers,
    };
    let body: string | undefined;
    if (request.form) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      body = new URLSearchParams(request.form).toString();
    }

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
      });
      const text = await response.text();

      return {
        status: response.status,
        ok: response.ok,
        text,
        body: parseJson(text),
      };
    } catch (error) {
      if (signal?.aborted) {
        throw new TransportError(`Request to ${request.url} was aborted`, "aborted", request.url, {
          cause: error,
        });
      }
      if (controller.signal.aborted) {
        throw new TransportError(
          `Request to ${request.url} timed out after ${this.timeoutMs}ms`,
          "timeout",
          request.url,
          { cause: error },
        );
      }
      throw new TransportError(`Network error: ${errorMessage(error)}`, "network", request.url, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
