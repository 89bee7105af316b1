/**
 * Token Storage Module
 *
 * Issues, consumes and validates authorization codes and access tokens on top
 * of the credential store. Values are 256-bit random hex strings; the store
 * only sees their SHA-256 hash.
 */

import type { CredentialStore } from "./credential-store.js";
import type { PkceMethod, Principal } from "./oauth2-types.js";
import { verifyPkce } from "./pkce.js";
import { generateSecureToken, hashToken } from "./secrets.js";
import { ACCESS_TOKEN_TTL_SECONDS, AUTHORIZATION_CODE_TTL_SECONDS } from "./constants.js";

export interface NewAuthorizationCode {
	clientId: string;
	userId: string;
	redirectUri: string;
	codeChallenge: string;
	codeChallengeMethod: PkceMethod;
	scope: string;
}

/**
 * Create and store an authorization code (single-use, 10-min TTL)
 *
 * @returns The plaintext code to hand to the client
 */
export async function createAuthorizationCode(
	store: CredentialStore,
	input: NewAuthorizationCode,
	now = Date.now(),
): Promise<string> {
	const code = generateSecureToken();
	await store.putAuthorizationCode({
		...input,
		codeHash: hashToken(code),
		expiresAt: now + AUTHORIZATION_CODE_TTL_SECONDS * 1000,
		createdAt: now,
	});
	return code;
}

export interface CodeExchange {
	code: string;
	clientId: string;
	redirectUri: string;
	codeVerifier: string;
}

/**
 * Consume an authorization code and check it against the exchange request.
 *
 * The code is removed by the store's atomic fetch-and-delete before any other
 * check runs, so a code can back at most one exchange even when the checks
 * below fail. Every failure returns null so callers cannot tell which check
 * rejected the code.
 */
export async function redeemAuthorizationCode(
	store: CredentialStore,
	exchange: CodeExchange,
	now = Date.now(),
): Promise<{ userId: string; scope: string } | null> {
	const record = await store.consumeAuthorizationCode(hashToken(exchange.code), exchange.clientId);
	if (!record) return null;
	if (record.expiresAt < now) return null;
	if (record.redirectUri !== exchange.redirectUri) return null;
	if (!verifyPkce(exchange.codeVerifier, record.codeChallenge, record.codeChallengeMethod)) {
		return null;
	}
	return { userId: record.userId, scope: record.scope };
}

/**
 * Mint and store an access token (1-hour TTL)
 */
export async function createAccessToken(
	store: CredentialStore,
	grant: { clientId: string; userId: string; scope: string },
	now = Date.now(),
): Promise<{ accessToken: string; expiresIn: number }> {
	const accessToken = generateSecureToken();
	await store.putAccessToken({
		...grant,
		tokenHash: hashToken(accessToken),
		expiresAt: now + ACCESS_TOKEN_TTL_SECONDS * 1000,
		createdAt: now,
	});
	return { accessToken, expiresIn: ACCESS_TOKEN_TTL_SECONDS };
}

/**
 * Resolve a bearer token to its principal. A token is valid through its
 * expiry instant; past it the token is treated as absent and deleted on sight.
 */
export async function validateAccessToken(
	store: CredentialStore,
	accessToken: string,
	now = Date.now(),
): Promise<Principal | null> {
	const tokenHash = hashToken(accessToken);
	const record = await store.getAccessToken(tokenHash);
	if (!record) return null;

	if (record.expiresAt < now) {
		await store.deleteAccessToken(tokenHash);
		return null;
	}

	return { userId: record.userId, clientId: record.clientId, scope: record.scope };
}

/**
 * Delete expired authorization codes and access tokens
 */
export async function sweepExpiredCredentials(
	store: CredentialStore,
	now = Date.now(),
): Promise<{ codes: number; tokens: number }> {
	return store.deleteExpiredBefore(now);
}
