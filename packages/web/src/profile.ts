/**
 * Maps verified OIDC claims onto a flat profile record
 *
 * Every profile field lists its sources in order; the first one that yields
 * a non-empty value wins. A source is either a claim name ("picture") or a
 * derived value prefixed with a colon (":full_name").
 */

import { ConfigurationError } from "@sso-bridge/core";
import { z } from "zod";

export type DerivedValue =
  | "identifier"
  | "email"
  | "full_name"
  | "given_name"
  | "family_name"
  | "preferred_username"
  | "sub";

export const DERIVED_VALUES: readonly DerivedValue[] = [
  "identifier",
  "email",
  "full_name",
  "given_name",
  "family_name",
  "preferred_username",
  "sub",
];

export type ClaimSource =
  | { kind: "claim"; name: string }
  | { kind: "derived"; value: DerivedValue };

export type FieldMappings = Record<string, ClaimSource[]>;

export type Claims = Record<string, unknown>;

export type UserProfile = Record<string, string>;

function isDerivedValue(value: string): value is DerivedValue {
  return DERIVED_VALUES.some((derived) => derived === value);
}

/**
 * Parses `"name"` or `":derived"` into a ClaimSource
 */
export function parseClaimSource(source: string): ClaimSource {
  const trimmed = source.trim();
  if (!trimmed) {
    throw new ConfigurationError(["Claim source cannot be empty"]);
  }
  if (!trimmed.startsWith(":")) {
    return { kind: "claim", name: trimmed };
  }

  const value = trimmed.slice(1);
  if (!isDerivedValue(value)) {
    throw new ConfigurationError([
      `Unknown derived value "${trimmed}" (expected one of ${DERIVED_VALUES.map((v) => `:${v}`).join(", ")})`,
    ]);
  }
  return { kind: "derived", value };
}

export const fieldMappingsSchema = z.record(z.array(z.string()).min(1));

/**
 * Parses field mappings in their string form, e.g. `{ "name": [":full_name"] }`
 */
export function parseFieldMappings(raw: Record<string, string[]>): FieldMappings {
  const problems: string[] = [];
  const mappings: FieldMappings = {};

  for (const [field, sources] of Object.entries(raw)) {
    const parsed: ClaimSource[] = [];
    for (const source of sources) {
      try {
        parsed.push(parseClaimSource(source));
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        problems.push(...error.problems.map((problem) => `${field}: ${problem}`));
      }
    }
    mappings[field] = parsed;
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return mappings;
}

export const DEFAULT_FIELD_MAPPINGS: FieldMappings = parseFieldMappings({
  username: [":email"],
  name: [":full_name"],
  identifier: [":identifier"],
});

/**
 * Non-empty trimmed string for a claim; numbers are stringified, anything
 * else counts as missing
 */
function claimText(claims: Claims, name: string): string | undefined {
  const value = claims[name];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/**
 * name → given_name + family_name → email → preferred_username → identifier
 */
function fullName(claims: Claims): string | undefined {
  const composed = [claimText(claims, "given_name"), claimText(claims, "family_name")]
    .filter((part): part is string => part !== undefined)
    .join(" ");

  return (
    claimText(claims, "name") ??
    (composed || undefined) ??
    claimText(claims, "email") ??
    claimText(claims, "preferred_username") ??
    claimText(claims, "identifier")
  );
}

export function deriveValue(value: DerivedValue, claims: Claims): string | undefined {
  switch (value) {
    case "full_name":
      return fullName(claims);
    default:
      return claimText(claims, value);
  }
}

function resolveSource(source: ClaimSource, claims: Claims): string | undefined {
  return source.kind === "claim"
    ? claimText(claims, source.name)
    : deriveValue(source.value, claims);
}

/**
 * Builds a profile from claims; fields with no usable source are left out
 */
export function mapClaims(
  claims: Claims,
  mappings: FieldMappings = DEFAULT_FIELD_MAPPINGS,
): UserProfile {
  const profile: UserProfile = {};

  for (const [field, sources] of Object.entries(mappings)) {
    for (const source of sources) {
      const value = resolveSource(source, claims);
      if (value !== undefined) {
        profile[field] = value;
        break;
      }
    }
  }

  return profile;
}
