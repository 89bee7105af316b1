/**
 * Test Setup
 *
 * Global test configuration and mock helpers.
 */

import { createHash } from "node:crypto";
import { beforeEach, vi } from "vitest";
import { z } from "zod";
import { createApp, type App } from "../src/app.js";
import { SqliteCredentialStore } from "../src/lib/credential-store.js";
import { openDatabase } from "../src/lib/database.js";
import type { UserResolver } from "../src/lib/identity.js";
import { SqliteSessionStore } from "../src/lib/session-store.js";
import { ToolRegistry } from "../src/lib/tool-registry.js";
import { registerContentTools } from "../src/tools/content.js";

// Mock global fetch
export const fetchMock = vi.fn<typeof fetch>();
vi.stubGlobal("fetch", fetchMock);

// Reset mocks before each test
beforeEach(() => {
	vi.clearAllMocks();
	fetchMock.mockReset();
});

export const TEST_CONTENT_API_URL = "https://cms.test/api";
export const TEST_CONTENT_API_TOKEN = "test-service-token";
export const TEST_REDIRECT_URI = "https://client.test/callback";
export const TEST_VERIFIER = "test-verifier-0123456789-abcdefghijklmnopqrstuvwxyz";

/**
 * Mock a successful fetch response
 */
export function mockFetchSuccess(data: unknown, status = 200) {
	fetchMock.mockResolvedValueOnce(
		new Response(JSON.stringify(data), {
			status,
			headers: { "Content-Type": "application/json" },
		}),
	);
}

/**
 * Mock a fetch error response
 */
export function mockFetchError(status: number, data: unknown) {
	fetchMock.mockResolvedValueOnce(
		new Response(typeof data === "string" ? data : JSON.stringify(data), {
			status,
			headers: { "Content-Type": "application/json" },
		}),
	);
}

/**
 * URL and init of the nth fetch call
 */
export function fetchCall(index = 0): { url: string; init: RequestInit } {
	const call = fetchMock.mock.calls[index];
	if (!call) throw new Error(`fetch was not called ${index + 1} time(s)`);
	const [input, init] = call;
	return { url: String(input), init: init ?? {} };
}

/**
 * Header of the nth fetch call
 */
export function fetchHeader(name: string, index = 0): string | null {
	return new Headers(fetchCall(index).init.headers).get(name);
}

// ============================================================================
// PKCE
// ============================================================================

export function s256(verifier: string): string {
	return createHash("sha256").update(verifier).digest("base64url");
}

// ============================================================================
// In-memory app
// ============================================================================

/** Fake host login: whoever `userId` names is signed in */
export interface FakeIdentity extends UserResolver {
	userId: string | null;
}

export function createFakeIdentity(userId: string | null = "editor-1"): FakeIdentity {
	const identity: FakeIdentity = {
		userId,
		async resolve() {
			return identity.userId;
		},
	};
	return identity;
}

export interface TestClock {
	now: () => number;
	advance: (ms: number) => void;
}

export function createClock(start = 1_700_000_000_000): TestClock {
	let current = start;
	return {
		now: () => current,
		advance: (ms) => {
			current += ms;
		},
	};
}

export function createTestApp(options: { userId?: string | null; clock?: TestClock } = {}) {
	const db = openDatabase(":memory:");
	const credentials = new SqliteCredentialStore(db);
	const sessionStore = new SqliteSessionStore(db);
	const identity = createFakeIdentity(options.userId === undefined ? "editor-1" : options.userId);
	const clock = options.clock ?? createClock();
	const tools = registerContentTools(new ToolRegistry(), {
		apiUrl: TEST_CONTENT_API_URL,
		apiToken: TEST_CONTENT_API_TOKEN,
	});

	const app = createApp({
		credentials,
		sessions: sessionStore,
		users: identity,
		tools,
		loginUrl: "/login",
		publicBaseUrl: "https://gateway.test",
		now: clock.now,
	});

	return { app, db, credentials, sessionStore, identity, clock };
}

// ============================================================================
// OAuth flow helpers
// ============================================================================

const RegisteredClientBody = z.object({
	client_id: z.string(),
	client_secret: z.string().optional(),
});

const TokenBody = z.object({
	access_token: z.string(),
	token_type: z.string(),
	expires_in: z.number(),
	scope: z.string(),
});

export async function registerClient(
	app: App,
	metadata: Record<string, unknown> = {},
): Promise<{ clientId: string; clientSecret?: string }> {
	const res = await app.request("/oauth/register", {
		method: "POST",
		headers: { "Content-Type": "application/json" },
		body: JSON.stringify({ client_name: "Test Client", redirect_uris: [TEST_REDIRECT_URI], ...metadata }),
	});
	if (res.status !== 201) throw new Error(`Registration failed with ${res.status}`);
	const body = RegisteredClientBody.parse(await res.json());
	return { clientId: body.client_id, clientSecret: body.client_secret };
}

export function form(fields: Record<string, string>): RequestInit {
	return {
		method: "POST",
		headers: { "Content-Type": "application/x-www-form-urlencoded" },
		body: new URLSearchParams(fields).toString(),
	};
}

/** Approve the consent form and return the redirect Location */
export async function approve(app: App, fields: Record<string, string>): Promise<URL> {
	const res = await app.request(
		"/oauth/authorize",
		form({
			response_type: "code",
			redirect_uri: TEST_REDIRECT_URI,
			code_challenge: s256(TEST_VERIFIER),
			code_challenge_method: "S256",
			state: "xyz",
			action: "approve",
			...fields,
		}),
	);
	const location = res.headers.get("Location");
	if (res.status !== 302 || !location) throw new Error(`Authorize failed with ${res.status}`);
	return new URL(location);
}

export async function issueAuthorizationCode(app: App, clientId: string): Promise<string> {
	const code = (await approve(app, { client_id: clientId })).searchParams.get("code");
	if (!code) throw new Error("No code in redirect");
	return code;
}

export async function exchangeCode(app: App, fields: Record<string, string>): Promise<Response> {
	return app.request(
		"/oauth/token",
		form({
			grant_type: "authorization_code",
			redirect_uri: TEST_REDIRECT_URI,
			code_verifier: TEST_VERIFIER,
			...fields,
		}),
	);
}

/** Register a public client and run the whole grant, returning a bearer token */
export async function obtainAccessToken(app: App): Promise<{ accessToken: string; clientId: string }> {
	const { clientId } = await registerClient(app);
	const code = await issueAuthorizationCode(app, clientId);
	const res = await exchangeCode(app, { client_id: clientId, code });
	if (res.status !== 200) throw new Error(`Token exchange failed with ${res.status}`);
	const body = TokenBody.parse(await res.json());
	return { accessToken: body.access_token, clientId };
}

export { TokenBody };
