/**
 * SQLite database bootstrap
 *
 * Opens the gateway database and creates the OAuth and session tables.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS oauth_clients (
	client_id TEXT PRIMARY KEY,
	client_secret_hash TEXT,
	client_name TEXT NOT NULL,
	redirect_uris TEXT NOT NULL,
	is_confidential INTEGER NOT NULL DEFAULT 0,
	created_at INTEGER NOT NULL,
	CHECK ((is_confidential = 1) = (client_secret_hash IS NOT NULL))
);

CREATE TABLE IF NOT EXISTS oauth_codes (
	code_hash TEXT PRIMARY KEY,
	client_id TEXT NOT NULL,
	user_id TEXT NOT NULL,
	redirect_uri TEXT NOT NULL,
	code_challenge TEXT NOT NULL,
	code_challenge_method TEXT NOT NULL,
	scope TEXT NOT NULL,
	expires_at INTEGER NOT NULL,
	created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS oauth_codes_expires_at ON oauth_codes (expires_at);

CREATE TABLE IF NOT EXISTS oauth_tokens (
	token_hash TEXT PRIMARY KEY,
	client_id TEXT NOT NULL,
	user_id TEXT NOT NULL,
	scope TEXT NOT NULL,
	expires_at INTEGER NOT NULL,
	created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS oauth_tokens_expires_at ON oauth_tokens (expires_at);

CREATE TABLE IF NOT EXISTS mcp_sessions (
	session_id TEXT PRIMARY KEY,
	created_at INTEGER NOT NULL
);
`;

/**
 * Open (or create) the database at `filePath` and apply the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filePath: string): Database.Database {
	if (filePath !== ":memory:") {
		fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
	}

	const db = new Database(filePath);
	db.pragma("journal_mode = WAL");
	db.pragma("busy_timeout = 5000");
	db.exec(SCHEMA);
	return db;
}
