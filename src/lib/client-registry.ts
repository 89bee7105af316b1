/**
 * OAuth Client Registry
 *
 * Dynamic client registration (RFC 7591) and client / redirect URI checks.
 */

import type { CredentialStore } from "./credential-store.js";
import type { ClientRecord } from "./oauth2-types.js";
import { constantTimeEqual, generateSecureToken, hashToken } from "./secrets.js";
import { LOOPBACK_HOSTS } from "./constants.js";

export interface ClientRegistration {
	name: string;
	redirectUris: string[];
	confidential: boolean;
}

export interface RegisteredClient {
	clientId: string;
	/** Plaintext secret, returned once for confidential clients */
	clientSecret?: string;
}

/**
 * Redirect URIs must be https, or plain http on a loopback host
 */
export function isAllowedRedirectUri(uri: string): boolean {
	let parsed: URL;
	try {
		parsed = new URL(uri);
	} catch {
		return false;
	}

	if (parsed.protocol === "https:") return true;
	return parsed.protocol === "http:" && LOOPBACK_HOSTS.includes(parsed.hostname);
}

export class ClientRegistry {
	constructor(
		private readonly store: CredentialStore,
		private readonly now: () => number = Date.now,
	) {}

	async register(registration: ClientRegistration): Promise<RegisteredClient> {
		const clientId = generateSecureToken();
		const clientSecret = registration.confidential ? generateSecureToken() : undefined;

		await this.store.putClient({
			clientId,
			clientSecretHash: clientSecret ? hashToken(clientSecret) : null,
			clientName: registration.name,
			redirectUris: [...registration.redirectUris],
			confidential: registration.confidential,
			createdAt: this.now(),
		});

		return clientSecret ? { clientId, clientSecret } : { clientId };
	}

	async getClient(clientId: string): Promise<ClientRecord | null> {
		return this.store.getClient(clientId);
	}

	/**
	 * Check client credentials. A client with a stored secret must present it;
	 * a public client is accepted on its id alone.
	 */
	async validate(clientId: string, clientSecret?: string): Promise<boolean> {
		const client = await this.store.getClient(clientId);
		if (!client) return false;

		if (client.clientSecretHash !== null) {
			if (!clientSecret) return false;
			return constantTimeEqual(hashToken(clientSecret), client.clientSecretHash);
		}

		return true;
	}

	/**
	 * Exact string match against the registered redirect URIs
	 */
	async validateRedirectUri(clientId: string, redirectUri: string): Promise<boolean> {
		const client = await this.store.getClient(clientId);
		return client !== null && client.redirectUris.includes(redirectUri);
	}
}
