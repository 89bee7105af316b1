/**
 * Credential Store
 *
 * Durable records for OAuth clients, authorization codes and access tokens.
 * The store exclusively owns these records; everything else goes through
 * this interface.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import { PKCE_METHODS } from "./constants.js";
import type { AccessTokenRecord, AuthorizationCodeRecord, ClientRecord } from "./oauth2-types.js";

export interface CredentialStore {
	putClient(client: ClientRecord): Promise<void>;
	getClient(clientId: string): Promise<ClientRecord | null>;

	putAuthorizationCode(code: AuthorizationCodeRecord): Promise<void>;
	/**
	 * Atomically fetch and delete the code issued to `clientId`. Two concurrent
	 * callers can never both receive the same record.
	 */
	consumeAuthorizationCode(codeHash: string, clientId: string): Promise<AuthorizationCodeRecord | null>;

	putAccessToken(token: AccessTokenRecord): Promise<void>;
	getAccessToken(tokenHash: string): Promise<AccessTokenRecord | null>;
	deleteAccessToken(tokenHash: string): Promise<void>;

	/** Delete codes and tokens whose expiry is before `now` (epoch ms) */
	deleteExpiredBefore(now: number): Promise<{ codes: number; tokens: number }>;
}

// ============================================================================
// Row schemas
// ============================================================================

const RedirectUrisColumn = z
	.string()
	.transform((value): unknown => JSON.parse(value))
	.pipe(z.array(z.string()));

const ClientRow = z
	.object({
		client_id: z.string(),
		client_secret_hash: z.string().nullable(),
		client_name: z.string(),
		redirect_uris: RedirectUrisColumn,
		is_confidential: z.number(),
		created_at: z.number(),
	})
	.transform(
		(row): ClientRecord => ({
			clientId: row.client_id,
			clientSecretHash: row.client_secret_hash,
			clientName: row.client_name,
			redirectUris: row.redirect_uris,
			confidential: row.is_confidential === 1,
			createdAt: row.created_at,
		}),
	);

const CodeRow = z
	.object({
		code_hash: z.string(),
		client_id: z.string(),
		user_id: z.string(),
		redirect_uri: z.string(),
		code_challenge: z.string(),
		code_challenge_method: z.enum(PKCE_METHODS),
		scope: z.string(),
		expires_at: z.number(),
		created_at: z.number(),
	})
	.transform(
		(row): AuthorizationCodeRecord => ({
			codeHash: row.code_hash,
			clientId: row.client_id,
			userId: row.user_id,
			redirectUri: row.redirect_uri,
			codeChallenge: row.code_challenge,
			codeChallengeMethod: row.code_challenge_method,
			scope: row.scope,
			expiresAt: row.expires_at,
			createdAt: row.created_at,
		}),
	);

const TokenRow = z
	.object({
		token_hash: z.string(),
		client_id: z.string(),
		user_id: z.string(),
		scope: z.string(),
		expires_at: z.number(),
		created_at: z.number(),
	})
	.transform(
		(row): AccessTokenRecord => ({
			tokenHash: row.token_hash,
			clientId: row.client_id,
			userId: row.user_id,
			scope: row.scope,
			expiresAt: row.expires_at,
			createdAt: row.created_at,
		}),
	);

// ============================================================================
// SQLite implementation
// ============================================================================

export class SqliteCredentialStore implements CredentialStore {
	constructor(private readonly db: Database.Database) {}

	async putClient(client: ClientRecord): Promise<void> {
		this.db
			.prepare(
				`INSERT INTO oauth_clients
					(client_id, client_secret_hash, client_name, redirect_uris, is_confidential, created_at)
				VALUES (?, ?, ?, ?, ?, ?)`,
			)
			.run(
				client.clientId,
				client.clientSecretHash,
				client.clientName,
				JSON.stringify(client.redirectUris),
				client.confidential ? 1 : 0,
				client.createdAt,
			);
	}

	async getClient(clientId: string): Promise<ClientRecord | null> {
		const row = this.db.prepare("SELECT * FROM oauth_clients WHERE client_id = ?").get(clientId);
		return row === undefined ? null : ClientRow.parse(row);
	}

	async putAuthorizationCode(code: AuthorizationCodeRecord): Promise<void> {
		this.db
			.prepare(
				`INSERT INTO oauth_codes
					(code_hash, client_id, user_id, redirect_uri, code_challenge, code_challenge_method, scope, expires_at, created_at)
				VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
			)
			.run(
				code.codeHash,
				code.clientId,
				code.userId,
				code.redirectUri,
				code.codeChallenge,
				code.codeChallengeMethod,
				code.scope,
				code.expiresAt,
				code.createdAt,
			);
	}

	async consumeAuthorizationCode(codeHash: string, clientId: string): Promise<AuthorizationCodeRecord | null> {
		// Single statement: the row is returned to exactly one caller.
		const row = this.db
			.prepare("DELETE FROM oauth_codes WHERE code_hash = ? AND client_id = ? RETURNING *")
			.get(codeHash, clientId);
		return row === undefined ? null : CodeRow.parse(row);
	}

	async putAccessToken(token: AccessTokenRecord): Promise<void> {
		this.db
			.prepare(
				`INSERT INTO oauth_tokens (token_hash, client_id, user_id, scope, expires_at, created_at)
				VALUES (?, ?, ?, ?, ?, ?)`,
			)
			.run(token.tokenHash, token.clientId, token.userId, token.scope, token.expiresAt, token.createdAt);
	}

	async getAccessToken(tokenHash: string): Promise<AccessTokenRecord | null> {
		const row = this.db.prepare("SELECT * FROM oauth_tokens WHERE token_hash = ?").get(tokenHash);
		return row === undefined ? null : TokenRow.parse(row);
	}

	async deleteAccessToken(tokenHash: string): Promise<void> {
		this.db.prepare("DELETE FROM oauth_tokens WHERE token_hash = ?").run(tokenHash);
	}

	async deleteExpiredBefore(now: number): Promise<{ codes: number; tokens: number }> {
		const sweep = this.db.transaction(() => {
			const codes = this.db.prepare("DELETE FROM oauth_codes WHERE expires_at < ?").run(now).changes;
			const tokens = this.db.prepare("DELETE FROM oauth_tokens WHERE expires_at < ?").run(now).changes;
			return { codes, tokens };
		});
		return sweep();
	}
}
