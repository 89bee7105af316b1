/**
 * MCP Routes
 *
 * POST-only JSON-RPC transport. Every POST carries one message; requests get
 * exactly one JSON reply, everything else is acknowledged with 202.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import { bearerAuth } from "../middleware/auth.js";
import type { CredentialStore } from "../lib/credential-store.js";
import { parseErrorResponse, parseJsonRpcMessage } from "../lib/jsonrpc.js";
import type { SessionManager } from "../lib/session-manager.js";
import { isInitializeResult, type McpDispatcher } from "../mcp-server.js";
import type { AppEnv } from "../app.js";
import { MCP_ROUTE, SESSION_COOKIE_NAME, SESSION_COOKIE_TTL_SECONDS, SESSION_ID_HEADER } from "../lib/constants.js";

export interface McpRouteDeps {
	dispatcher: McpDispatcher;
	sessions: SessionManager;
	store: CredentialStore;
	now?: () => number;
}

function isSecureRequest(c: Context<AppEnv>): boolean {
	const forwarded = c.req.header("X-Forwarded-Proto")?.split(",")[0]?.trim();
	if (forwarded) return forwarded === "https";
	return new URL(c.req.url).protocol === "https:";
}

/** Session id from the cookie, falling back to the Mcp-Session-Id header */
function readSessionId(c: Context<AppEnv>): string | null {
	return getCookie(c, SESSION_COOKIE_NAME) || c.req.header(SESSION_ID_HEADER) || null;
}

export function createMcpRoutes(deps: McpRouteDeps) {
	const { dispatcher, sessions, store } = deps;
	const now = deps.now ?? Date.now;
	const mcpRoutes = new Hono<AppEnv>();
	const auth = bearerAuth(store, now);

	/**
	 * GET /mcp
	 * No server-initiated stream; rejected before authentication
	 */
	mcpRoutes.get(MCP_ROUTE, (c) => {
		return c.json(
			{ error: "method_not_allowed", message: "This endpoint only accepts POST and DELETE" },
			405,
			{ Allow: "POST, DELETE" },
		);
	});

	/**
	 * POST /mcp
	 */
	mcpRoutes.post(MCP_ROUTE, auth, async (c) => {
		let body: unknown;
		try {
			body = JSON.parse(await c.req.text());
		} catch {
			return c.json(parseErrorResponse(), 400);
		}

		const parsed = parseJsonRpcMessage(body);
		if (!parsed.ok) {
			return c.json(parsed.response, 400);
		}

		const outcome = await dispatcher.dispatch(parsed.message, {
			principal: c.get("principal"),
			sessionId: readSessionId(c),
		});

		if (outcome.kind === "none") {
			return c.body(null, 202);
		}

		if (isInitializeResult(outcome.result)) {
			const sessionId = await sessions.create();
			setCookie(c, SESSION_COOKIE_NAME, sessionId, {
				path: "/",
				expires: new Date(now() + SESSION_COOKIE_TTL_SECONDS * 1000),
				httpOnly: true,
				sameSite: "Lax",
				secure: isSecureRequest(c),
			});
			c.header(SESSION_ID_HEADER, sessionId);
		}

		return c.json(outcome.response);
	});

	/**
	 * DELETE /mcp
	 * Explicit session termination
	 */
	mcpRoutes.delete(MCP_ROUTE, auth, async (c) => {
		const sessionId = readSessionId(c);
		if (!sessionId) {
			return c.json({ error: "missing_session", message: "No MCP session id provided" }, 400);
		}

		if (!(await sessions.terminate(sessionId))) {
			return c.json({ error: "invalid_session", message: "MCP session not found" }, 404);
		}

		deleteCookie(c, SESSION_COOKIE_NAME, { path: "/", secure: isSecureRequest(c) });
		return c.json({ success: true });
	});

	return mcpRoutes;
}
