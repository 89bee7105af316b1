/**
 * Content MCP Gateway - Entry Point
 *
 * Loads configuration, opens the database and serves the Hono app on Node.
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig } from "./lib/config.js";
import { SqliteCredentialStore } from "./lib/credential-store.js";
import { openDatabase } from "./lib/database.js";
import { safeLogError } from "./lib/errors.js";
import { signedCookieUserResolver } from "./lib/identity.js";
import { SqliteSessionStore } from "./lib/session-store.js";
import { ToolRegistry } from "./lib/tool-registry.js";
import { registerContentTools } from "./tools/content.js";

function main(): void {
	const config = loadConfig();
	const db = openDatabase(config.databasePath);

	const tools = registerContentTools(new ToolRegistry(), {
		apiUrl: config.contentApiUrl,
		apiToken: config.contentApiToken,
	});

	const app = createApp({
		credentials: new SqliteCredentialStore(db),
		sessions: new SqliteSessionStore(db),
		users: signedCookieUserResolver(config.userCookieSecret, config.userCookieName),
		tools,
		loginUrl: config.loginUrl,
		publicBaseUrl: config.publicBaseUrl,
		logRequests: config.logRequests,
	});

	const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
		console.log(`Content MCP gateway listening on http://${info.address}:${info.port}`);
	});

	const shutdown = (signal: string) => {
		console.log(`Received ${signal}, shutting down`);
		server.close((error) => {
			if (error) safeLogError("Error closing server", error);
			db.close();
			process.exit(error ? 1 : 0);
		});
	};
	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
	main();
} catch (error) {
	safeLogError("Failed to start", error);
	process.exit(1);
}
