/**
 * Content tools
 *
 * Post management backed by the content API, run as the user the access token
 * was issued to.
 */

import { ContentClient } from "../lib/client.js";
import { successResponse } from "../lib/errors.js";
import {
	CreatePostSchema,
	DeletePostSchema,
	GetPostSchema,
	ListPostsSchema,
	PostListSchema,
	PostSchema,
	UpdatePostSchema,
} from "../lib/schemas.js";
import type { ToolContext, ToolRegistry } from "../lib/tool-registry.js";

export interface ContentToolsOptions {
	apiUrl: string;
	apiToken?: string;
}

function describePost(response: unknown, fallback: string): string {
	const post = PostSchema.safeParse(response);
	return post.success ? `"${post.data.title}" (ID ${post.data.id}, ${post.data.status})` : fallback;
}

export function registerContentTools(registry: ToolRegistry, options: ContentToolsOptions): ToolRegistry {
	const clientFor = (context: ToolContext) =>
		new ContentClient({
			baseUrl: options.apiUrl,
			apiToken: options.apiToken,
			actingUser: context.principal.userId,
		});

	// ============================================
	// READ TOOLS
	// ============================================

	registry.register({
		name: "list_posts",
		description: "List posts, optionally filtered by status or a search term",
		inputSchema: ListPostsSchema,
		annotations: { title: "List posts", readOnlyHint: true, idempotentHint: true },
		handler: async (args, context) => {
			const response = await clientFor(context).listPosts(args);
			const list = PostListSchema.safeParse(response);
			const total = list.success ? list.data.total : 0;
			const filter = args.search ? ` matching "${args.search}"` : "";
			return successResponse(`Found ${total} posts${filter}`, response);
		},
	});

	registry.register({
		name: "get_post",
		description: "Get a single post by ID, including its content",
		inputSchema: GetPostSchema,
		annotations: { title: "Get post", readOnlyHint: true, idempotentHint: true },
		handler: async ({ postId }, context) => {
			const response = await clientFor(context).getPost(postId);
			return successResponse(`Post ${describePost(response, String(postId))}`, response);
		},
	});

	// ============================================
	// WRITE TOOLS
	// ============================================

	registry.register({
		name: "create_post",
		description: "Create a new post. Posts are created as drafts unless a status is given.",
		inputSchema: CreatePostSchema,
		annotations: { title: "Create post", readOnlyHint: false, destructiveHint: false, idempotentHint: false },
		handler: async (args, context) => {
			const response = await clientFor(context).createPost(args);
			return successResponse(`Created post ${describePost(response, args.title)}`, response);
		},
	});

	registry.register({
		name: "update_post",
		description: "Update the title, content, excerpt or status of an existing post",
		inputSchema: UpdatePostSchema,
		annotations: { title: "Update post", readOnlyHint: false, destructiveHint: false, idempotentHint: true },
		handler: async ({ postId, ...changes }, context) => {
			if (Object.values(changes).every((value) => value === undefined)) {
				throw new Error("Provide at least one field to update");
			}
			const response = await clientFor(context).updatePost(postId, changes);
			return successResponse(`Updated post ${describePost(response, String(postId))}`, response);
		},
	});

	registry.register({
		name: "delete_post",
		description: "Move a post to the trash, or delete it permanently with force",
		inputSchema: DeletePostSchema,
		annotations: { title: "Delete post", readOnlyHint: false, destructiveHint: true, idempotentHint: true },
		handler: async ({ postId, force }, context) => {
			const response = await clientFor(context).deletePost(postId, force ?? false);
			const verb = force ? "Permanently deleted" : "Trashed";
			return successResponse(`${verb} post ${postId}`, response);
		},
	});

	return registry;
}
