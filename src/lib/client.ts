/**
 * Content API Client
 *
 * Calls the content backend's REST API on behalf of a signed-in user. The
 * gateway authenticates with its own service token and names the acting user
 * in `X-Acting-User`; the backend applies that user's permissions.
 */

import { parseResponse, truncate } from "./transforms.js";
import { ContentApiError } from "./errors.js";
import type { CreatePostInput, ListPostsParams, UpdatePostInput } from "./schemas.js";
import { MAX_ERROR_TEXT_LENGTH } from "./constants.js";

export interface ContentClientConfig {
	baseUrl: string;
	apiToken?: string;
	actingUser: string;
}

type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export class ContentClient {
	private baseUrl: string;
	private apiToken?: string;
	private actingUser: string;

	constructor(config: ContentClientConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "");
		this.apiToken = config.apiToken;
		this.actingUser = config.actingUser;
	}

	/**
	 * Make an API request to the content backend
	 */
	private async apiRequest(
		method: HttpMethod,
		path: string,
		options: { query?: Record<string, string>; body?: unknown } = {},
	): Promise<unknown> {
		let requestUrl = `${this.baseUrl}${path}`;
		if (options.query && Object.keys(options.query).length > 0) {
			requestUrl = `${requestUrl}?${new URLSearchParams(options.query).toString()}`;
		}

		const headers: Record<string, string> = {
			Accept: "application/json",
			"X-Acting-User": this.actingUser,
		};
		if (this.apiToken) {
			headers.Authorization = `Bearer ${this.apiToken}`;
		}

		const init: RequestInit = { method, headers };
		if (options.body !== undefined) {
			headers["Content-Type"] = "application/json";
			init.body = JSON.stringify(options.body);
		}

		const response = await fetch(requestUrl, init);
		const text = await response.text();

		if (!response.ok) {
			const safeText = truncate(text, MAX_ERROR_TEXT_LENGTH);
			throw new ContentApiError(
				`Content API error: ${response.status} - ${safeText}`,
				response.status,
				parseResponse(text),
			);
		}

		return parseResponse(text);
	}

	// =========================================================================
	// Posts
	// =========================================================================

	async listPosts(params: ListPostsParams = {}): Promise<unknown> {
		const query: Record<string, string> = {
			status: params.status ?? "publish",
			page: String(params.page ?? 1),
			per_page: String(params.perPage ?? 10),
		};
		if (params.search) {
			query.search = params.search;
		}
		return this.apiRequest("GET", "/posts", { query });
	}

	async getPost(postId: number): Promise<unknown> {
		return this.apiRequest("GET", `/posts/${postId}`);
	}

	async createPost(input: CreatePostInput): Promise<unknown> {
		return this.apiRequest("POST", "/posts", {
			body: { ...input, status: input.status ?? "draft" },
		});
	}

	async updatePost(postId: number, changes: UpdatePostInput): Promise<unknown> {
		return this.apiRequest("PATCH", `/posts/${postId}`, { body: changes });
	}

	async deletePost(postId: number, force = false): Promise<unknown> {
		return this.apiRequest("DELETE", `/posts/${postId}`, {
			query: force ? { force: "true" } : undefined,
		});
	}
}
