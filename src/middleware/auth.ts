/**
 * Bearer token authentication middleware
 *
 * Resolves the access token to a principal and stores it on the context.
 */

import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../app.js";
import type { CredentialStore } from "../lib/credential-store.js";
import { validateAccessToken } from "../lib/token-storage.js";
import { MCP_ROUTE } from "../lib/constants.js";

function challenge(baseUrl: string, error?: string): string {
	const resourceMetadataUrl = `${baseUrl}/.well-known/oauth-protected-resource`;
	const parts = [`realm="${baseUrl}${MCP_ROUTE}"`, `resource_metadata="${resourceMetadataUrl}"`];
	if (error) parts.push(`error="${error}"`);
	return `Bearer ${parts.join(", ")}`;
}

/**
 * Bearer token authentication middleware.
 * The scheme is matched case-insensitively.
 */
export function bearerAuth(store: CredentialStore, now: () => number = Date.now) {
	return createMiddleware<AppEnv>(async (c, next) => {
		const baseUrl = c.get("baseUrl");
		const match = c.req.header("Authorization")?.match(/^Bearer\s+(\S+)\s*$/i);

		if (!match) {
			return c.json(
				{
					error: "unauthorized",
					message: "Authentication required. Please provide a valid Bearer token.",
				},
				401,
				{ "WWW-Authenticate": challenge(baseUrl) },
			);
		}

		const principal = await validateAccessToken(store, match[1], now());

		if (!principal) {
			return c.json(
				{
					error: "invalid_token",
					message: "Invalid or expired token. Please authenticate again.",
				},
				401,
				{ "WWW-Authenticate": challenge(baseUrl, "invalid_token") },
			);
		}

		c.set("principal", principal);

		await next();
	});
}
