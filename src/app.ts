/**
 * Content MCP Gateway - Main Hono Application
 */

import { Hono } from "hono";
import { logger } from "hono/logger";
import { safeLogError } from "./lib/errors.js";
import { ClientRegistry } from "./lib/client-registry.js";
import type { CredentialStore } from "./lib/credential-store.js";
import type { UserResolver } from "./lib/identity.js";
import type { Principal } from "./lib/oauth2-types.js";
import { ResourceRegistry } from "./lib/resource-registry.js";
import { SessionManager } from "./lib/session-manager.js";
import type { SessionStore } from "./lib/session-store.js";
import type { ToolRegistry } from "./lib/tool-registry.js";
import { createMcpServer, createServerInfoResource } from "./mcp-server.js";
import { createOAuth2Routes } from "./routes/oauth2.js";
import { createMcpRoutes } from "./routes/mcp.js";
import utilityRoutes from "./routes/utility.js";
import { SESSION_ID_HEADER } from "./lib/constants.js";

// Variables interface for Hono context
export interface Variables {
	principal: Principal;
	baseUrl: string;
}

export type AppEnv = { Variables: Variables };

export interface AppDeps {
	credentials: CredentialStore;
	sessions: SessionStore;
	users: UserResolver;
	tools: ToolRegistry;
	resources?: ResourceRegistry;
	loginUrl?: string;
	/** External origin; the request origin when unset */
	publicBaseUrl?: string;
	logRequests?: boolean;
	now?: () => number;
}

// Paths that use Bearer auth (not cookies) and need open CORS for MCP clients
const OPEN_CORS_PREFIXES = ["/mcp", "/.well-known", "/health"];
const OPEN_CORS_EXACT = ["/oauth/token", "/oauth/register"];

const ALLOW_METHODS = "GET, POST, DELETE, OPTIONS";
const ALLOW_HEADERS = `Content-Type, Authorization, ${SESSION_ID_HEADER}, Mcp-Protocol-Version`;
const EXPOSE_HEADERS = `${SESSION_ID_HEADER}, WWW-Authenticate`;

function needsOpenCors(path: string): boolean {
	return OPEN_CORS_PREFIXES.some((p) => path.startsWith(p)) || OPEN_CORS_EXACT.includes(path);
}

export function createApp(deps: AppDeps) {
	const now = deps.now ?? Date.now;
	const app = new Hono<AppEnv>();

	const clients = new ClientRegistry(deps.credentials, now);
	const sessions = new SessionManager(deps.sessions, now);
	const resources = deps.resources ?? createServerInfoResource(new ResourceRegistry());
	const dispatcher = createMcpServer(deps.tools, resources);

	if (deps.logRequests) {
		app.use("*", logger());
	}

	// Global CORS and security headers middleware
	app.use("*", async (c, next) => {
		const url = new URL(c.req.url);
		const isOpen = needsOpenCors(url.pathname);
		c.set("baseUrl", deps.publicBaseUrl ?? url.origin);

		// Handle OPTIONS preflight requests
		if (c.req.method === "OPTIONS") {
			const requestOrigin = c.req.header("Origin") || "";
			const corsOrigin = isOpen ? "*" : requestOrigin === url.origin ? requestOrigin : "";
			return new Response(null, {
				status: 204,
				headers: {
					...(corsOrigin ? { "Access-Control-Allow-Origin": corsOrigin } : {}),
					...(!isOpen && corsOrigin ? { Vary: "Origin" } : {}),
					"Access-Control-Allow-Methods": ALLOW_METHODS,
					"Access-Control-Allow-Headers": ALLOW_HEADERS,
					"Access-Control-Max-Age": "86400",
				},
			});
		}

		await next();

		// CORS: open for MCP/Bearer routes, same-origin only for cookie routes
		if (isOpen) {
			c.res.headers.set("Access-Control-Allow-Origin", "*");
			c.res.headers.set("Access-Control-Expose-Headers", EXPOSE_HEADERS);
		} else {
			const origin = c.req.header("Origin");
			if (origin === url.origin) {
				c.res.headers.set("Access-Control-Allow-Origin", origin);
			}
			c.res.headers.append("Vary", "Origin");
		}
		c.res.headers.set("Access-Control-Allow-Methods", ALLOW_METHODS);
		c.res.headers.set("Access-Control-Allow-Headers", ALLOW_HEADERS);

		// Security headers
		c.res.headers.set("X-Content-Type-Options", "nosniff");
		c.res.headers.set("X-Frame-Options", "DENY");
		c.res.headers.set("Referrer-Policy", "strict-origin-when-cross-origin");
		c.res.headers.set("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
		c.res.headers.set("Content-Security-Policy", "default-src 'self'; style-src 'unsafe-inline'");
	});

	// Error handling middleware
	app.onError((err, c) => {
		safeLogError("Unhandled error", err);
		return c.json(
			{
				error: "internal_server_error",
				message: "An unexpected error occurred",
			},
			500,
		);
	});

	// Mount routes
	app.route(
		"/",
		createOAuth2Routes({
			store: deps.credentials,
			clients,
			users: deps.users,
			loginUrl: deps.loginUrl ?? "/login",
			now,
		}),
	);
	app.route("/", createMcpRoutes({ dispatcher, sessions, store: deps.credentials, now }));
	app.route("/", utilityRoutes);

	// 404 handler
	app.notFound((c) => {
		return c.json({ error: "not_found", message: "Not found" }, 404);
	});

	return app;
}

export type App = ReturnType<typeof createApp>;
