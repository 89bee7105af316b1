/**
 * Error handling utilities for the content MCP gateway
 */
import { ZodError } from "zod";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

/**
 * MCP Tool Response type
 */
export interface McpToolResponse {
	[x: string]: unknown;
	content: Array<{
		type: "text";
		text: string;
	}>;
	isError?: boolean;
}

/**
 * JSON-RPC error raised by method handlers. Surfaced to the caller verbatim;
 * anything else thrown by a handler becomes an internal error.
 */
export class JsonRpcError extends Error {
	code: number;
	data?: unknown;

	constructor(code: number, message: string, data?: unknown) {
		super(message);
		this.name = "JsonRpcError";
		this.code = code;
		this.data = data;
	}

	static invalidParams(message: string, data?: unknown): JsonRpcError {
		return new JsonRpcError(ErrorCode.InvalidParams, message, data);
	}

	static methodNotFound(method: string): JsonRpcError {
		return new JsonRpcError(ErrorCode.MethodNotFound, `Method not found: ${method}`);
	}
}

/**
 * Error class for content backend API errors
 */
export class ContentApiError extends Error {
	status: number;
	data?: unknown;

	constructor(message: string, status: number, data?: unknown) {
		super(message);
		this.name = "ContentApiError";
		this.status = status;
		this.data = data;
	}
}

/**
 * HTTP status code to user-friendly message mapping
 */
const STATUS_CODE_MESSAGES: Record<number, string> = {
	400: "Invalid request parameters",
	401: "The content backend rejected the gateway credentials",
	403: "The signed-in user is not allowed to perform this action",
	404: "Resource not found",
	409: "The resource was modified concurrently",
	429: "Rate limit exceeded",
	500: "Content backend error",
	502: "Content backend is temporarily unavailable",
	503: "Content backend is temporarily unavailable",
};

function getStatusMessage(status: number): string {
	return STATUS_CODE_MESSAGES[status] || `Unexpected error (HTTP ${status})`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Format a content backend error into an MCP tool response
 */
function formatContentApiError(error: ContentApiError): McpToolResponse {
	const parts: string[] = [];

	parts.push(`Error: ${getStatusMessage(error.status)}`);
	parts.push("");
	parts.push("**What went wrong:**");
	parts.push(error.message);

	if (typeof error.data === "string") {
		parts.push("");
		parts.push("**Details:**");
		parts.push(error.data);
	} else if (isRecord(error.data)) {
		const { code, message } = error.data;
		if (typeof code === "string" || typeof message === "string") {
			parts.push("");
			parts.push("**API Error:**");
			if (typeof code === "string") parts.push(`Code: ${code}`);
			if (typeof message === "string") parts.push(`Message: ${message}`);
		}
	}

	parts.push("");
	parts.push("**How to fix:**");

	switch (error.status) {
		case 400:
			parts.push("  - Check that all required parameters are provided");
			parts.push("  - Ensure all values are within valid ranges");
			break;

		case 401:
		case 403:
			parts.push("  - Check that your account has permission for this action");
			parts.push("  - Re-authorize the client if your role has changed");
			break;

		case 404:
			parts.push("  - Verify the post ID exists");
			parts.push("  - Use list_posts to find valid IDs");
			break;

		case 429:
			parts.push("  - Wait before making more requests");
			break;

		case 500:
		case 502:
		case 503:
			parts.push("  - This is a temporary backend issue");
			parts.push("  - Try again in a few moments");
			break;

		default:
			parts.push("  - Review the error details above");
	}

	return {
		content: [
			{
				type: "text",
				text: parts.join("\n"),
			},
		],
		isError: true,
	};
}

/**
 * Format a Zod validation error into an MCP tool response
 */
function formatValidationError(error: ZodError): McpToolResponse {
	const parts: string[] = [];

	parts.push("Error: Schema Validation Failed");
	parts.push("");
	parts.push("**What went wrong:**");
	parts.push("The provided arguments do not match the expected format.");
	parts.push("");

	// Group errors by path
	const errorsByPath = new Map<string, string[]>();

	for (const issue of error.errors) {
		const path = issue.path.length > 0 ? issue.path.join(".") : "root";
		const messages = errorsByPath.get(path) || [];
		messages.push(issue.message);
		errorsByPath.set(path, messages);
	}

	parts.push("**Validation Issues:**");
	for (const [path, messages] of errorsByPath.entries()) {
		if (path === "root") {
			for (const message of messages) {
				parts.push(`  - ${message}`);
			}
		} else {
			parts.push(`  - **${path}**:`);
			for (const message of messages) {
				parts.push(`    ${message}`);
			}
		}
	}

	return {
		content: [
			{
				type: "text",
				text: parts.join("\n"),
			},
		],
		isError: true,
	};
}

/**
 * Safe error logger that avoids leaking sensitive data
 */
export function safeLogError(context: string, error: unknown): void {
	const message = error instanceof Error ? error.message : "Unknown error";
	console.error(`${context}: ${message}`);
}

/**
 * Format a summary line and a JSON payload into an MCP tool response
 */
export function successResponse(summary: string, data: unknown): McpToolResponse {
	return {
		content: [
			{ type: "text", text: summary },
			{ type: "text", text: JSON.stringify(data, null, 2) },
		],
	};
}

/**
 * Central error handler that routes tool errors to the matching formatter
 */
export function handleError(error: unknown): McpToolResponse {
	if (error instanceof ContentApiError) {
		return formatContentApiError(error);
	}

	if (error instanceof ZodError) {
		return formatValidationError(error);
	}

	if (error instanceof Error) {
		return {
			content: [
				{
					type: "text",
					text: `Error: ${error.message}`,
				},
			],
			isError: true,
		};
	}

	return {
		content: [
			{
				type: "text",
				text: "An unknown error occurred",
			},
		],
		isError: true,
	};
}
