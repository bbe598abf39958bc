/**
 * JSON helpers shared by the store, discovery and token modules
 */

import type { ZodError } from "zod";

/**
 * Type guard for plain JSON objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses JSON text, returning null for empty or malformed input
 */
export function parseJson(text: string): unknown {
  if (text.trim() === "") {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Flattens zod issues into a single line, e.g. "jwks_uri: Required"
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
