/**
 * JSON-RPC 2.0 Dispatcher
 *
 * Routes parsed messages to registered handlers. Requests and notifications
 * live in separate tables; each handler declares a zod schema for its params,
 * validated once here before the handler runs.
 */

import { type ZodType, type ZodTypeDef } from "zod";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { JsonRpcError, safeLogError } from "./errors.js";
import { errorResponse, successResponse, type JsonRpcMessage, type JsonRpcResponse } from "./jsonrpc.js";

export type ParamsSchema<P> = ZodType<P, ZodTypeDef, unknown>;

export type RequestHandler<P, C> = (params: P, context: C) => unknown;
export type NotificationHandler<P, C> = (params: P, context: C) => void | Promise<void>;

/** Outcome of dispatching one message: a reply, or nothing to send */
export type DispatchResult =
	| { kind: "response"; response: JsonRpcResponse; result?: unknown }
	| { kind: "none" };

type BoundHandler<C> = (params: unknown, context: C) => Promise<unknown>;

function bind<P, C>(
	method: string,
	schema: ParamsSchema<P>,
	handler: (params: P, context: C) => unknown,
): BoundHandler<C> {
	return async (rawParams, context) => {
		const parsed = schema.safeParse(rawParams ?? {});
		if (!parsed.success) {
			throw new JsonRpcError(
				ErrorCode.InvalidParams,
				`Invalid params for ${method}`,
				parsed.error.errors.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
			);
		}
		return handler(parsed.data, context);
	};
}

export class JsonRpcDispatcher<C> {
	private readonly requestHandlers = new Map<string, BoundHandler<C>>();
	private readonly notificationHandlers = new Map<string, BoundHandler<C>>();

	onRequest<P>(method: string, schema: ParamsSchema<P>, handler: RequestHandler<P, C>): this {
		if (this.requestHandlers.has(method)) {
			throw new Error(`Request handler for ${method} is already registered`);
		}
		this.requestHandlers.set(method, bind(method, schema, handler));
		return this;
	}

	onNotification<P>(method: string, schema: ParamsSchema<P>, handler: NotificationHandler<P, C>): this {
		if (this.notificationHandlers.has(method)) {
			throw new Error(`Notification handler for ${method} is already registered`);
		}
		this.notificationHandlers.set(method, bind(method, schema, handler));
		return this;
	}

	async dispatch(message: JsonRpcMessage, context: C): Promise<DispatchResult> {
		switch (message.kind) {
			case "request":
				return this.processRequest(message.id, message.method, message.params, context);

			case "notification":
				await this.processNotification(message.method, message.params, context);
				return { kind: "none" };

			default:
				// Nothing is waiting on a client's response or error
				console.warn(`Ignoring unexpected JSON-RPC ${message.kind} message (id: ${String(message.id)})`);
				return { kind: "none" };
		}
	}

	private async processRequest(
		id: string | number,
		method: string,
		params: Record<string, unknown> | undefined,
		context: C,
	): Promise<DispatchResult> {
		const handler = this.requestHandlers.get(method);
		if (!handler) {
			const error = JsonRpcError.methodNotFound(method);
			return { kind: "response", response: errorResponse(id, error.code, error.message) };
		}

		try {
			const result = (await handler(params, context)) ?? {};
			return { kind: "response", response: successResponse(id, result), result };
		} catch (error) {
			if (error instanceof JsonRpcError) {
				return { kind: "response", response: errorResponse(id, error.code, error.message, error.data) };
			}
			safeLogError(`Error handling ${method}`, error);
			const message = error instanceof Error ? error.message : "Internal error";
			return { kind: "response", response: errorResponse(id, ErrorCode.InternalError, message) };
		}
	}

	private async processNotification(
		method: string,
		params: Record<string, unknown> | undefined,
		context: C,
	): Promise<void> {
		const handler = this.notificationHandlers.get(method);
		if (!handler) {
			console.warn(`Dropping notification with no handler: ${method}`);
			return;
		}

		try {
			await handler(params, context);
		} catch (error) {
			safeLogError(`Error handling notification ${method}`, error);
		}
	}
}
