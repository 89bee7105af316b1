/**
 * PKCE (RFC 7636) verification
 */

import { createHash } from "node:crypto";
import { constantTimeEqual } from "./secrets.js";
import type { PkceMethod } from "./oauth2-types.js";

/** base64url-no-padding(SHA-256(verifier)) */
export function computeS256Challenge(codeVerifier: string): string {
	return createHash("sha256").update(codeVerifier).digest("base64url");
}

/**
 * Verify a code_verifier against the stored challenge. Unsupported methods are
 * rejected at the authorization endpoint before a code is ever issued.
 */
export function verifyPkce(codeVerifier: string, codeChallenge: string, method: PkceMethod): boolean {
	const computed = method === "S256" ? computeS256Challenge(codeVerifier) : codeVerifier;
	return constantTimeEqual(computed, codeChallenge);
}
