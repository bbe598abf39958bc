/**
 * Code verifiers and S256/plain challenges for the authorization code flow
 * (RFC 7636)
 */

import { createHash, randomBytes } from "crypto";
import type { ChallengeMethod } from "../config.js";
import { base64UrlEncode, safeEqual } from "../crypto.js";
import { InvalidParameterError, UnsupportedMethodError } from "../errors.js";
import type { PkcePair } from "./types.js";

export const MIN_VERIFIER_LENGTH = 43;
export const MAX_VERIFIER_LENGTH = 128;

const VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

/**
 * Random verifier of exactly `length` (43..128) base64url characters, all
 * within the unreserved set `[A-Za-z0-9-._~]`
 */
export function generateCodeVerifier(length: number = MAX_VERIFIER_LENGTH): string {
    if (
        !Number.isInteger(length) ||
        length < MIN_VERIFIER_LENGTH ||
        length > MAX_VERIFIER_LENGTH
    ) {
        throw new InvalidParameterError(
            `Code verifier length must be between ${MIN_VERIFIER_LENGTH} and ${MAX_VERIFIER_LENGTH}, got ${length}`,
        );
    }

    // Every 3 random bytes become 4 base64url characters
    const buffer = randomBytes(Math.ceil((length * 3) / 4));
    return base64UrlEncode(buffer).slice(0, length);
}

/**
 * Generates the code challenge for a verifier
 * S256: challenge = BASE64URL(SHA256(verifier)); plain: challenge = verifier
 */
export function generateCodeChallenge(verifier: string, method: string = "S256"): string {
    switch (method) {
        case "S256":
            return base64UrlEncode(createHash("sha256").update(verifier).digest());
        case "plain":
            return verifier;
        default:
            throw new UnsupportedMethodError(method);
    }
}

/**
 * Recomputes the challenge and compares in constant time.
 * Never throws; any failure is a mismatch.
 */
export function verifyCodeChallenge(
    verifier: string,
    challenge: string,
    method: string = "S256",
): boolean {
    try {
        return safeEqual(generateCodeChallenge(verifier, method), challenge);
    } catch {
        return false;
    }
}

/**
 * Checks length and character set only
 */
export function validateCodeVerifier(verifier: string): boolean {
    return VERIFIER_PATTERN.test(verifier);
}

/**
 * Creates a complete PKCE challenge pair
 */
export function createPkcePair(
    length: number = MAX_VERIFIER_LENGTH,
    method: ChallengeMethod = "S256",
): PkcePair {
    const codeVerifier = generateCodeVerifier(length);
    const codeChallenge = generateCodeChallenge(codeVerifier, method);

    return {
        codeVerifier,
        codeChallenge,
        codeChallengeMethod: method,
    };
}
