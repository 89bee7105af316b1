/**
 * JSON-RPC 2.0 message types, envelope parsing and response builders
 */

import { z } from "zod";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

// ============================================================================
// Types
// ============================================================================

export type RequestId = string | number;

export interface JsonRpcErrorObject {
	code: number;
	message: string;
	data?: unknown;
}

export type JsonRpcMessage =
	| { kind: "request"; id: RequestId; method: string; params?: Record<string, unknown> }
	| { kind: "notification"; method: string; params?: Record<string, unknown> }
	| { kind: "response"; id: RequestId | null; result: unknown }
	| { kind: "error"; id: RequestId | null; error: JsonRpcErrorObject };

export type JsonRpcResponse =
	| { jsonrpc: "2.0"; id: RequestId; result: unknown }
	| { jsonrpc: "2.0"; id: RequestId | null; error: JsonRpcErrorObject };

export type ParseResult =
	| { ok: true; message: JsonRpcMessage }
	| { ok: false; response: JsonRpcResponse };

// ============================================================================
// Envelope schema
// ============================================================================

const RequestIdSchema = z.union([z.string(), z.number()]);

const ErrorObjectSchema = z.object({
	code: z.number().int(),
	message: z.string(),
	data: z.unknown().optional(),
});

const EnvelopeSchema = z.object({
	jsonrpc: z.literal("2.0"),
	id: RequestIdSchema.optional(),
	method: z.string().optional(),
	params: z.record(z.unknown()).optional(),
	result: z.unknown().optional(),
	error: ErrorObjectSchema.optional(),
});

// ============================================================================
// Response Builders
// ============================================================================

export function successResponse(id: RequestId, result: unknown): JsonRpcResponse {
	return { jsonrpc: "2.0", id, result };
}

export function errorResponse(
	id: RequestId | null,
	code: number,
	message: string,
	data?: unknown,
): JsonRpcResponse {
	return {
		jsonrpc: "2.0",
		id,
		error: { code, message, ...(data !== undefined && { data }) },
	};
}

export function parseErrorResponse(): JsonRpcResponse {
	return errorResponse(null, ErrorCode.ParseError, "Parse error");
}

// ============================================================================
// Parsing
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Best-effort id for error replies to envelopes that failed validation */
function salvageId(body: Record<string, unknown>): RequestId | null {
	const parsed = RequestIdSchema.safeParse(body.id);
	return parsed.success ? parsed.data : null;
}

function invalidRequest(id: RequestId | null, message: string): ParseResult {
	return { ok: false, response: errorResponse(id, ErrorCode.InvalidRequest, message) };
}

/**
 * Classify a decoded JSON body into a Request, Notification, Response or
 * Error by the presence of `method`, `id`, `result` and `error`.
 */
export function parseJsonRpcMessage(body: unknown): ParseResult {
	if (Array.isArray(body)) {
		return invalidRequest(null, "Batch requests are not supported");
	}
	if (!isPlainObject(body)) {
		return invalidRequest(null, "Invalid JSON-RPC message structure.");
	}

	const parsed = EnvelopeSchema.safeParse(body);
	if (!parsed.success) {
		const issue = parsed.error.errors[0];
		const field = issue && issue.path.length > 0 ? issue.path.join(".") : "message";
		return invalidRequest(salvageId(body), `Invalid JSON-RPC message: ${field} is invalid`);
	}

	const envelope = parsed.data;

	if (envelope.method !== undefined) {
		if (envelope.id !== undefined) {
			return {
				ok: true,
				message: { kind: "request", id: envelope.id, method: envelope.method, params: envelope.params },
			};
		}
		return { ok: true, message: { kind: "notification", method: envelope.method, params: envelope.params } };
	}

	if (envelope.error !== undefined) {
		return { ok: true, message: { kind: "error", id: envelope.id ?? null, error: envelope.error } };
	}

	if (Object.hasOwn(body, "result")) {
		return { ok: true, message: { kind: "response", id: envelope.id ?? null, result: envelope.result } };
	}

	return invalidRequest(envelope.id ?? null, "Invalid JSON-RPC message structure.");
}
