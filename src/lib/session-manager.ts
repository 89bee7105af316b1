/**
 * MCP Session Manager
 *
 * Sessions are transport-level handles only. They carry no permissions
 * (every request is authorized by its bearer token) and exist so a client can
 * explicitly terminate a conversation.
 */

import { randomUUID } from "node:crypto";
import type { SessionRecord, SessionStore } from "./session-store.js";

export class SessionManager {
	constructor(
		private readonly store: SessionStore,
		private readonly now: () => number = Date.now,
	) {}

	async create(): Promise<string> {
		const sessionId = randomUUID();
		await this.store.insert({ sessionId, createdAt: this.now() });
		return sessionId;
	}

	async lookup(sessionId: string): Promise<SessionRecord | null> {
		return this.store.get(sessionId);
	}

	async terminate(sessionId: string): Promise<boolean> {
		return this.store.delete(sessionId);
	}
}
