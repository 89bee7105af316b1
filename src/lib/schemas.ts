/**
 * Zod schemas for content tools and OAuth request parameters
 */
import { z } from "zod";
import { MAX_CLIENT_NAME_LENGTH, TOKEN_ENDPOINT_AUTH_METHODS } from "./constants.js";

// ============================================================================
// Enums
// ============================================================================

export const PostStatusEnum = z.enum(["publish", "draft", "pending", "private"]);
export type PostStatus = z.infer<typeof PostStatusEnum>;

// ============================================================================
// Tool Parameter Schemas
// ============================================================================

const PostIdField = z.number().int().positive().describe("The post ID");

export const ListPostsSchema = z.object({
	status: z
		.union([PostStatusEnum, z.literal("any")])
		.optional()
		.describe('Filter by status (default: "publish")'),
	search: z.string().min(1).max(200).optional().describe("Full-text search term"),
	page: z.number().int().min(1).max(1000).optional().describe("Page number (default: 1)"),
	perPage: z
		.number()
		.int()
		.min(1)
		.max(100)
		.optional()
		.describe("Posts per page (default: 10, max: 100)"),
});

export const GetPostSchema = z.object({
	postId: PostIdField,
});

export const CreatePostSchema = z.object({
	title: z.string().min(1).max(500).describe("Post title"),
	content: z.string().optional().describe("Post body (HTML)"),
	excerpt: z.string().max(1000).optional().describe("Short summary"),
	status: PostStatusEnum.optional().describe('Initial status (default: "draft")'),
});

export const UpdatePostSchema = z.object({
	postId: PostIdField,
	title: z.string().min(1).max(500).optional().describe("New title"),
	content: z.string().optional().describe("New body (HTML)"),
	excerpt: z.string().max(1000).optional().describe("New summary"),
	status: PostStatusEnum.optional().describe("New status"),
});

export const DeletePostSchema = z.object({
	postId: PostIdField,
	force: z
		.boolean()
		.optional()
		.describe("Delete permanently instead of moving to trash (default: false)"),
});

export type ListPostsParams = z.infer<typeof ListPostsSchema>;
export type CreatePostInput = z.infer<typeof CreatePostSchema>;
export type UpdatePostInput = Omit<z.infer<typeof UpdatePostSchema>, "postId">;

// ============================================================================
// OAuth Request Schemas
// ============================================================================

/** Parameters of GET and POST /oauth/authorize; presence is checked per phase */
export const AuthorizeParamsSchema = z.object({
	client_id: z.string().optional(),
	redirect_uri: z.string().optional(),
	response_type: z.string().optional(),
	code_challenge: z.string().optional(),
	code_challenge_method: z.string().optional(),
	state: z.string().default(""),
	scope: z.string().optional(),
	action: z.string().optional(),
});
export type AuthorizeParams = z.infer<typeof AuthorizeParamsSchema>;

export const TokenRequestSchema = z.object({
	grant_type: z.string().optional(),
	code: z.string().optional(),
	redirect_uri: z.string().optional(),
	client_id: z.string().optional(),
	client_secret: z.string().optional(),
	code_verifier: z.string().optional(),
});
export type TokenRequest = z.infer<typeof TokenRequestSchema>;

/** RFC 7591 client metadata accepted by POST /oauth/register */
export const RegistrationRequestSchema = z.object({
	client_name: z
		.string({ required_error: "client_name is required" })
		.trim()
		.min(1, "client_name is required")
		.max(MAX_CLIENT_NAME_LENGTH, `client_name must be at most ${MAX_CLIENT_NAME_LENGTH} characters`),
	redirect_uris: z
		.array(z.string(), { required_error: "redirect_uris is required" })
		.min(1, "At least one redirect URI is required"),
	token_endpoint_auth_method: z
		.enum(TOKEN_ENDPOINT_AUTH_METHODS, {
			errorMap: () => ({ message: "Unsupported token_endpoint_auth_method" }),
		})
		.default("none"),
});
export type RegistrationRequest = z.infer<typeof RegistrationRequestSchema>;

// ============================================================================
// Content API Response Types
// ============================================================================

export const PostSchema = z
	.object({
		id: z.number(),
		title: z.string(),
		status: z.string(),
	})
	.passthrough();
export type Post = z.infer<typeof PostSchema>;

export const PostListSchema = z.object({
	items: z.array(PostSchema),
	total: z.number().int().nonnegative(),
});
export type PostList = z.infer<typeof PostListSchema>;
