/**
 * Redaction of secrets before anything is written to a log
 */

import { isRecord } from "./json.js";

/**
 * Key fragments whose values are never logged
 */
const SENSITIVE_FIELDS = [
  "password",
  "secret",
  "token",
  "apikey",
  "privatekey",
  "encryptionkey",
  "verifier",
  "authorization",
  "cookie",
];

export function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELDS.some((field) => lowerKey.includes(field));
}

/**
 * Redacts sensitive values from an object for safe logging
 */
export function redactSensitiveData(
  obj: object,
  depth: number = 3,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      result[key] = "[REDACTED]";
    } else if (isRecord(value) && depth > 1) {
      result[key] = redactSensitiveData(value, depth - 1);
    } else if (isRecord(value)) {
      result[key] = "[Object]";
    } else {
      result[key] = value;
    }
  }

  return result;
}
