/**
 * OAuth 2.1 Authorization Server Types
 *
 * Records owned by the credential store. Codes and tokens are keyed by the
 * SHA-256 hex of their value; the plaintext only ever leaves in a response.
 */

import type { PKCE_METHODS } from "./constants.js";

export type PkceMethod = (typeof PKCE_METHODS)[number];

/** A dynamically registered OAuth client */
export interface ClientRecord {
	clientId: string;
	clientSecretHash: string | null; // null for public clients
	clientName: string;
	redirectUris: string[];
	confidential: boolean;
	createdAt: number;
}

/** A single-use authorization code */
export interface AuthorizationCodeRecord {
	codeHash: string;
	clientId: string;
	userId: string;
	redirectUri: string;
	codeChallenge: string;
	codeChallengeMethod: PkceMethod;
	scope: string;
	expiresAt: number;
	createdAt: number;
}

/** A bearer access token */
export interface AccessTokenRecord {
	tokenHash: string;
	clientId: string;
	userId: string;
	scope: string;
	expiresAt: number;
	createdAt: number;
}

/** Identity resolved from a bearer token, attached to the request context */
export interface Principal {
	userId: string;
	clientId: string;
	scope: string;
}
