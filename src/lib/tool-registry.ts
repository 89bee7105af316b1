/**
 * Tool Registry
 *
 * Tools are declared with a zod object schema. The registry publishes the
 * schema as JSON Schema for `tools/list` and validates arguments against it
 * on `tools/call`.
 */

import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { handleError, JsonRpcError, type McpToolResponse } from "./errors.js";
import type { Principal } from "./oauth2-types.js";
import { TOOL_NAME_PATTERN } from "./constants.js";

export interface ToolAnnotations {
	title?: string;
	readOnlyHint?: boolean;
	destructiveHint?: boolean;
	idempotentHint?: boolean;
	openWorldHint?: boolean;
}

/** Per-call context handed to every tool */
export interface ToolContext {
	principal: Principal;
	sessionId: string | null;
}

export interface ToolDefinition<S extends z.AnyZodObject> {
	name: string;
	description: string;
	inputSchema: S;
	annotations?: ToolAnnotations;
	handler: (args: z.infer<S>, context: ToolContext) => Promise<McpToolResponse>;
}

export interface ToolDescriptor {
	name: string;
	description: string;
	inputSchema: ReturnType<typeof zodToJsonSchema>;
	annotations?: ToolAnnotations;
}

interface RegisteredTool {
	descriptor: ToolDescriptor;
	run: (args: unknown, context: ToolContext) => Promise<McpToolResponse>;
}

export class ToolRegistry {
	private readonly tools = new Map<string, RegisteredTool>();

	register<S extends z.AnyZodObject>(definition: ToolDefinition<S>): this {
		if (!TOOL_NAME_PATTERN.test(definition.name)) {
			throw new Error(`Invalid tool name: ${definition.name}`);
		}
		if (this.tools.has(definition.name)) {
			throw new Error(`Tool already registered: ${definition.name}`);
		}
		for (const key of Object.keys(definition.inputSchema.shape)) {
			if (!TOOL_NAME_PATTERN.test(key)) {
				throw new Error(`Invalid property name "${key}" in tool ${definition.name}`);
			}
		}

		this.tools.set(definition.name, {
			descriptor: {
				name: definition.name,
				description: definition.description,
				inputSchema: zodToJsonSchema(definition.inputSchema, { $refStrategy: "none" }),
				...(definition.annotations && { annotations: definition.annotations }),
			},
			run: async (args, context) => {
				const parsed = definition.inputSchema.parse(args ?? {});
				return definition.handler(parsed, context);
			},
		});
		return this;
	}

	list(): ToolDescriptor[] {
		return [...this.tools.values()].map((tool) => tool.descriptor);
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	/**
	 * Run a tool. Unknown names are a protocol error; bad arguments and tool
	 * failures come back as an `isError` result.
	 */
	async call(name: string, args: unknown, context: ToolContext): Promise<McpToolResponse> {
		const tool = this.tools.get(name);
		if (!tool) {
			throw JsonRpcError.invalidParams(`Unknown tool: ${name}`);
		}

		try {
			return await tool.run(args, context);
		} catch (error) {
			return handleError(error);
		}
	}
}
