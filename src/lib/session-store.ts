/**
 * MCP transport session persistence
 */

import type Database from "better-sqlite3";
import { z } from "zod";

export interface SessionRecord {
	sessionId: string;
	createdAt: number;
}

export interface SessionStore {
	insert(session: SessionRecord): Promise<void>;
	get(sessionId: string): Promise<SessionRecord | null>;
	/** @returns true when a session was deleted */
	delete(sessionId: string): Promise<boolean>;
}

const SessionRow = z
	.object({ session_id: z.string(), created_at: z.number() })
	.transform((row): SessionRecord => ({ sessionId: row.session_id, createdAt: row.created_at }));

export class SqliteSessionStore implements SessionStore {
	constructor(private readonly db: Database.Database) {}

	async insert(session: SessionRecord): Promise<void> {
		this.db
			.prepare("INSERT INTO mcp_sessions (session_id, created_at) VALUES (?, ?)")
			.run(session.sessionId, session.createdAt);
	}

	async get(sessionId: string): Promise<SessionRecord | null> {
		const row = this.db.prepare("SELECT * FROM mcp_sessions WHERE session_id = ?").get(sessionId);
		return row === undefined ? null : SessionRow.parse(row);
	}

	async delete(sessionId: string): Promise<boolean> {
		return this.db.prepare("DELETE FROM mcp_sessions WHERE session_id = ?").run(sessionId).changes > 0;
	}
}
