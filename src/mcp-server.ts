/**
 * MCP Server
 *
 * Registers the MCP methods on a JSON-RPC dispatcher. The transport route
 * feeds parsed messages in; tools and resources come from their registries.
 */

import { z } from "zod";
import {
	InitializeResultSchema,
	LATEST_PROTOCOL_VERSION,
	SUPPORTED_PROTOCOL_VERSIONS,
	type InitializeResult,
} from "@modelcontextprotocol/sdk/types.js";
import { JsonRpcDispatcher } from "./lib/dispatcher.js";
import { ResourceRegistry } from "./lib/resource-registry.js";
import type { ToolContext, ToolRegistry } from "./lib/tool-registry.js";
import { APP_VERSION, SERVER_NAME } from "./lib/constants.js";

export type McpDispatcher = JsonRpcDispatcher<ToolContext>;

const InitializeParamsSchema = z
	.object({
		protocolVersion: z.string().optional(),
		capabilities: z.record(z.unknown()).default({}),
		clientInfo: z.object({ name: z.string(), version: z.string() }).passthrough().optional(),
	})
	.passthrough();

const EmptyParamsSchema = z.object({}).passthrough();

const PaginatedParamsSchema = z
	.object({
		cursor: z.string().optional(),
	})
	.passthrough();

const CallToolParamsSchema = z.object({
	name: z.string(),
	arguments: z.record(z.unknown()).optional(),
});

const ReadResourceParamsSchema = z.object({
	uri: z.string(),
});

/**
 * Echo the client's version when supported, otherwise offer the latest
 */
export function negotiateProtocolVersion(requested?: string): string {
	return requested !== undefined && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
		? requested
		: LATEST_PROTOCOL_VERSION;
}

/**
 * Whether a handler result is a successful initialize result. The transport
 * opens a session on exactly these.
 */
export function isInitializeResult(result: unknown): result is InitializeResult {
	return InitializeResultSchema.safeParse(result).success;
}

export function createServerInfoResource(registry: ResourceRegistry): ResourceRegistry {
	return registry.register({
		uri: "gateway://server-info",
		name: "Server info",
		description: "Name, version and protocol version of this gateway",
		mimeType: "application/json",
		read: () =>
			JSON.stringify(
				{ name: SERVER_NAME, version: APP_VERSION, protocolVersion: LATEST_PROTOCOL_VERSION },
				null,
				2,
			),
	});
}

export function createMcpServer(tools: ToolRegistry, resources: ResourceRegistry): McpDispatcher {
	const dispatcher = new JsonRpcDispatcher<ToolContext>();

	// ============================================
	// LIFECYCLE
	// ============================================

	dispatcher.onRequest("initialize", InitializeParamsSchema, (params): InitializeResult => ({
		protocolVersion: negotiateProtocolVersion(params.protocolVersion),
		capabilities: {
			tools: { listChanged: false },
			resources: { subscribe: false, listChanged: false },
		},
		serverInfo: { name: SERVER_NAME, version: APP_VERSION },
		instructions: "Manage posts in the content system as the signed-in user.",
	}));

	dispatcher.onNotification("notifications/initialized", EmptyParamsSchema, () => {});

	dispatcher.onRequest("ping", EmptyParamsSchema, () => ({}));

	// ============================================
	// TOOLS
	// ============================================

	dispatcher.onRequest("tools/list", PaginatedParamsSchema, () => ({ tools: tools.list() }));

	dispatcher.onRequest("tools/call", CallToolParamsSchema, (params, context) =>
		tools.call(params.name, params.arguments ?? {}, context),
	);

	// ============================================
	// RESOURCES
	// ============================================

	dispatcher.onRequest("resources/list", PaginatedParamsSchema, () => ({ resources: resources.list() }));

	dispatcher.onRequest("resources/read", ReadResourceParamsSchema, async (params) => ({
		contents: await resources.read(params.uri),
	}));

	dispatcher.onRequest("resources/templates/list", PaginatedParamsSchema, () => ({
		resourceTemplates: resources.listTemplates(),
	}));

	return dispatcher;
}
