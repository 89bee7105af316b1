/**
 * OAuth 2.1 Authorization Server Routes
 *
 * - Authorization Server Metadata (RFC 8414)
 * - Protected Resource Metadata (RFC 9728)
 * - Dynamic Client Registration (RFC 7591)
 * - Authorization Endpoint (with PKCE)
 * - Token Endpoint
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { isAllowedRedirectUri, type ClientRegistry } from "../lib/client-registry.js";
import type { CredentialStore } from "../lib/credential-store.js";
import type { UserResolver } from "../lib/identity.js";
import type { ClientRecord, PkceMethod } from "../lib/oauth2-types.js";
import {
	AuthorizeParamsSchema,
	RegistrationRequestSchema,
	TokenRequestSchema,
	type AuthorizeParams,
} from "../lib/schemas.js";
import { createAccessToken, createAuthorizationCode, redeemAuthorizationCode } from "../lib/token-storage.js";
import { parseBasicCredentials, stringFields } from "../lib/transforms.js";
import { renderConsentPage } from "../views/authorize.js";
import type { AppEnv } from "../app.js";
import {
	DEFAULT_SCOPE,
	MAX_REDIRECT_URI_LENGTH,
	MAX_REDIRECT_URIS,
	MCP_ROUTE,
	PKCE_METHODS,
	SUPPORTED_SCOPES,
	TOKEN_ENDPOINT_AUTH_METHODS,
} from "../lib/constants.js";

export interface OAuth2RouteDeps {
	store: CredentialStore;
	clients: ClientRegistry;
	users: UserResolver;
	loginUrl: string;
	now?: () => number;
}

// ============================================================================
// Helpers
// ============================================================================

function oauthError(c: Context<AppEnv>, status: 400 | 401, error: string, description: string) {
	return c.json({ error, error_description: description }, status);
}

/** Append query parameters to a redirect URI; an empty state is left out */
function buildRedirect(redirectUri: string, params: Record<string, string>, state: string): string {
	const url = new URL(redirectUri);
	for (const [key, value] of Object.entries(params)) {
		url.searchParams.set(key, value);
	}
	if (state) url.searchParams.set("state", state);
	return url.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPkceMethod(value: string): PkceMethod | undefined {
	return PKCE_METHODS.find((method) => method === value);
}

interface ValidatedAuthorizeRequest {
	client: ClientRecord;
	redirectUri: string;
	codeChallenge: string;
	codeChallengeMethod: PkceMethod;
	state: string;
	scope: string;
}

type AuthorizeValidation =
	| { ok: true; request: ValidatedAuthorizeRequest }
	| { ok: false; response: Response };

/**
 * Two-phase validation. Until the client and its redirect URI are known to
 * match, errors are answered directly; after that they go back to the client
 * through the redirect URI.
 */
async function validateAuthorizeRequest(
	c: Context<AppEnv>,
	clients: ClientRegistry,
	params: AuthorizeParams,
): Promise<AuthorizeValidation> {
	// Phase 1: never redirect to an unverified URI
	if (!params.client_id || !params.redirect_uri) {
		return {
			ok: false,
			response: oauthError(c, 400, "invalid_request", "client_id and redirect_uri are required"),
		};
	}

	const client = await clients.getClient(params.client_id);
	if (!client) {
		return { ok: false, response: oauthError(c, 400, "invalid_client", "Unknown client_id") };
	}

	if (!(await clients.validateRedirectUri(client.clientId, params.redirect_uri))) {
		return {
			ok: false,
			response: oauthError(c, 400, "invalid_request", "redirect_uri does not match any registered URI"),
		};
	}

	// Phase 2: report through the redirect URI
	const redirectUri = params.redirect_uri;
	const state = params.state;
	const fail = (error: string, description: string): AuthorizeValidation => ({
		ok: false,
		response: c.redirect(buildRedirect(redirectUri, { error, error_description: description }, state)),
	});

	if (params.response_type !== "code") {
		return fail("unsupported_response_type", "Only response_type=code is supported");
	}

	if (!params.code_challenge) {
		return fail("invalid_request", "code_challenge is required");
	}

	const codeChallengeMethod = toPkceMethod(params.code_challenge_method || "S256");
	if (!codeChallengeMethod) {
		return fail("invalid_request", "code_challenge_method must be S256 or plain");
	}

	return {
		ok: true,
		request: {
			client,
			redirectUri,
			codeChallenge: params.code_challenge,
			codeChallengeMethod,
			state,
			scope: params.scope || DEFAULT_SCOPE,
		},
	};
}

// ============================================================================
// Routes
// ============================================================================

export function createOAuth2Routes(deps: OAuth2RouteDeps) {
	const { store, clients, users, loginUrl } = deps;
	const now = deps.now ?? Date.now;
	const oauth2Routes = new Hono<AppEnv>();

	// ========================================================================
	// Metadata Endpoints
	// ========================================================================

	/**
	 * GET /.well-known/oauth-authorization-server
	 * RFC 8414 - Authorization Server Metadata
	 */
	oauth2Routes.get("/.well-known/oauth-authorization-server", (c) => {
		const baseUrl = c.get("baseUrl");
		return c.json({
			issuer: baseUrl,
			authorization_endpoint: `${baseUrl}/oauth/authorize`,
			token_endpoint: `${baseUrl}/oauth/token`,
			registration_endpoint: `${baseUrl}/oauth/register`,
			scopes_supported: SUPPORTED_SCOPES,
			response_types_supported: ["code"],
			response_modes_supported: ["query"],
			grant_types_supported: ["authorization_code"],
			token_endpoint_auth_methods_supported: TOKEN_ENDPOINT_AUTH_METHODS,
			code_challenge_methods_supported: PKCE_METHODS,
		});
	});

	/**
	 * GET /.well-known/oauth-protected-resource[/mcp]
	 * RFC 9728 - Protected Resource Metadata
	 */
	const protectedResource = (c: Context<AppEnv>) => {
		const baseUrl = c.get("baseUrl");
		return c.json({
			resource: `${baseUrl}${MCP_ROUTE}`,
			authorization_servers: [baseUrl],
			scopes_supported: SUPPORTED_SCOPES,
			bearer_methods_supported: ["header"],
		});
	};
	oauth2Routes.get("/.well-known/oauth-protected-resource", protectedResource);
	oauth2Routes.get(`/.well-known/oauth-protected-resource${MCP_ROUTE}`, protectedResource);

	// ========================================================================
	// Dynamic Client Registration (RFC 7591)
	// ========================================================================

	/**
	 * POST /oauth/register
	 */
	oauth2Routes.post("/oauth/register", async (c) => {
		let body: unknown;
		try {
			body = await c.req.json();
		} catch {
			return oauthError(c, 400, "invalid_client_metadata", "Request body must be valid JSON");
		}

		const parsed = RegistrationRequestSchema.safeParse(body);
		if (!parsed.success) {
			const issue = parsed.error.errors[0];
			const error = issue?.path[0] === "redirect_uris" ? "invalid_redirect_uri" : "invalid_client_metadata";
			return oauthError(c, 400, error, issue?.message ?? "Invalid client metadata");
		}

		const metadata = parsed.data;

		if (metadata.redirect_uris.length > MAX_REDIRECT_URIS) {
			return oauthError(c, 400, "invalid_redirect_uri", `Too many redirect URIs (max ${MAX_REDIRECT_URIS})`);
		}

		for (const uri of metadata.redirect_uris) {
			if (uri.length > MAX_REDIRECT_URI_LENGTH) {
				return oauthError(c, 400, "invalid_redirect_uri", "redirect_uri too long");
			}
			if (!isAllowedRedirectUri(uri)) {
				return oauthError(
					c,
					400,
					"invalid_redirect_uri",
					"redirect_uris must use https, or http on a loopback host",
				);
			}
		}

		const clientName = metadata.client_name;
		const authMethod = metadata.token_endpoint_auth_method;
		const registered = await clients.register({
			name: clientName,
			redirectUris: metadata.redirect_uris,
			confidential: authMethod !== "none",
		});

		// The plaintext secret is only returned once
		c.header("Cache-Control", "no-store");
		c.header("Pragma", "no-cache");
		return c.json(
			{
				client_id: registered.clientId,
				...(registered.clientSecret ? { client_secret: registered.clientSecret } : {}),
				client_name: clientName,
				redirect_uris: metadata.redirect_uris,
				grant_types: ["authorization_code"],
				response_types: ["code"],
				token_endpoint_auth_method: authMethod,
			},
			201,
		);
	});

	// ========================================================================
	// Authorization Endpoint
	// ========================================================================

	oauth2Routes.use("/oauth/authorize", async (c, next) => {
		await next();
		c.res.headers.set("Cache-Control", "no-store");
	});

	/**
	 * GET /oauth/authorize
	 * Sends anonymous users to the host login, everyone else to the consent page
	 */
	oauth2Routes.get("/oauth/authorize", async (c) => {
		const params = AuthorizeParamsSchema.parse(c.req.query());
		const validation = await validateAuthorizeRequest(c, clients, params);
		if (!validation.ok) return validation.response;
		const { request } = validation;

		const userId = await users.resolve(c);
		if (!userId) {
			const baseUrl = c.get("baseUrl");
			const requestUrl = new URL(c.req.url);
			const loginRedirect = new URL(loginUrl, baseUrl);
			loginRedirect.searchParams.set("redirect_to", `${baseUrl}${requestUrl.pathname}${requestUrl.search}`);
			return c.redirect(loginRedirect.toString());
		}

		return c.html(
			renderConsentPage({
				clientName: request.client.clientName,
				userId,
				clientId: request.client.clientId,
				redirectUri: request.redirectUri,
				responseType: "code",
				state: request.state,
				codeChallenge: request.codeChallenge,
				codeChallengeMethod: request.codeChallengeMethod,
				scope: request.scope,
			}),
		);
	});

	/**
	 * POST /oauth/authorize
	 * Processes the consent form
	 */
	oauth2Routes.post("/oauth/authorize", async (c) => {
		const params = AuthorizeParamsSchema.parse(stringFields(await c.req.parseBody()));
		const validation = await validateAuthorizeRequest(c, clients, params);
		if (!validation.ok) return validation.response;
		const { request } = validation;

		const userId = await users.resolve(c);
		if (!userId) {
			return oauthError(c, 401, "login_required", "Sign in before approving access");
		}

		if (params.action === "deny") {
			return c.redirect(
				buildRedirect(
					request.redirectUri,
					{ error: "access_denied", error_description: "The user denied the request" },
					request.state,
				),
			);
		}

		if (params.action === "approve") {
			const code = await createAuthorizationCode(
				store,
				{
					clientId: request.client.clientId,
					userId,
					redirectUri: request.redirectUri,
					codeChallenge: request.codeChallenge,
					codeChallengeMethod: request.codeChallengeMethod,
					scope: request.scope,
				},
				now(),
			);
			return c.redirect(buildRedirect(request.redirectUri, { code }, request.state));
		}

		return oauthError(c, 400, "invalid_request", "action must be approve or deny");
	});

	// ========================================================================
	// Token Endpoint
	// ========================================================================

	/**
	 * POST /oauth/token
	 * Exchange an authorization code for an access token (with PKCE verification)
	 */
	oauth2Routes.post("/oauth/token", async (c) => {
		let fields: Record<string, string>;
		if (c.req.header("Content-Type")?.includes("application/json")) {
			try {
				const json: unknown = await c.req.json();
				fields = isRecord(json) ? stringFields(json) : {};
			} catch {
				return oauthError(c, 400, "invalid_request", "Request body must be valid JSON");
			}
		} else {
			fields = stringFields(await c.req.parseBody());
		}
		const params = TokenRequestSchema.parse(fields);

		if (params.grant_type !== "authorization_code") {
			return oauthError(c, 400, "unsupported_grant_type", "Only authorization_code is supported");
		}

		// client_secret_basic takes precedence over client_secret_post
		const basic = parseBasicCredentials(c.req.header("Authorization"));
		if (basic && params.client_id && params.client_id !== basic.clientId) {
			return oauthError(c, 400, "invalid_request", "client_id does not match the Basic credentials");
		}
		const clientId = basic?.clientId ?? params.client_id;
		const clientSecret = basic?.clientSecret ?? params.client_secret;

		const missing = [
			["code", params.code],
			["redirect_uri", params.redirect_uri],
			["client_id", clientId],
			["code_verifier", params.code_verifier],
		]
			.filter(([, value]) => !value)
			.map(([name]) => name);
		if (!params.code || !params.redirect_uri || !clientId || !params.code_verifier) {
			return oauthError(c, 400, "invalid_request", `Missing required parameters: ${missing.join(", ")}`);
		}

		if (!(await clients.validate(clientId, clientSecret))) {
			if (basic) c.header("WWW-Authenticate", 'Basic realm="oauth"');
			return oauthError(c, 401, "invalid_client", "Invalid client credentials");
		}

		const grant = await redeemAuthorizationCode(
			store,
			{
				code: params.code,
				clientId,
				redirectUri: params.redirect_uri,
				codeVerifier: params.code_verifier,
			},
			now(),
		);
		if (!grant) {
			return oauthError(c, 400, "invalid_grant", "Invalid or expired authorization code");
		}

		const token = await createAccessToken(store, { clientId, userId: grant.userId, scope: grant.scope }, now());

		c.header("Cache-Control", "no-store");
		c.header("Pragma", "no-cache");
		return c.json({
			access_token: token.accessToken,
			token_type: "Bearer",
			expires_in: token.expiresIn,
			scope: grant.scope,
		});
	});

	return oauth2Routes;
}
