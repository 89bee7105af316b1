import { describe, it, expect, beforeEach } from "vitest";
import { SqliteCredentialStore } from "../../src/lib/credential-store.js";
import { openDatabase } from "../../src/lib/database.js";
import { hashToken } from "../../src/lib/secrets.js";
import {
	createAccessToken,
	createAuthorizationCode,
	redeemAuthorizationCode,
	sweepExpiredCredentials,
	validateAccessToken,
} from "../../src/lib/token-storage.js";
import { s256, TEST_REDIRECT_URI, TEST_VERIFIER } from "../setup.js";

const NOW = 1_700_000_000_000;

describe("Token Storage", () => {
	let store: SqliteCredentialStore;

	beforeEach(() => {
		store = new SqliteCredentialStore(openDatabase(":memory:"));
	});

	async function issueCode(now = NOW): Promise<string> {
		return createAuthorizationCode(
			store,
			{
				clientId: "client-1",
				userId: "editor-1",
				redirectUri: TEST_REDIRECT_URI,
				codeChallenge: s256(TEST_VERIFIER),
				codeChallengeMethod: "S256",
				scope: "mcp",
			},
			now,
		);
	}

	const exchange = (code: string) => ({
		code,
		clientId: "client-1",
		redirectUri: TEST_REDIRECT_URI,
		codeVerifier: TEST_VERIFIER,
	});

	describe("createAuthorizationCode", () => {
		it("should store only the hash of the code with a 10-minute expiry", async () => {
			const code = await issueCode();
			expect(code).toMatch(/^[0-9a-f]{64}$/);

			const record = await store.consumeAuthorizationCode(hashToken(code), "client-1");
			expect(record).toMatchObject({
				codeHash: hashToken(code),
				userId: "editor-1",
				expiresAt: NOW + 600_000,
				createdAt: NOW,
			});
		});
	});

	describe("redeemAuthorizationCode", () => {
		it("should return the grant for a valid exchange", async () => {
			const code = await issueCode();
			await expect(redeemAuthorizationCode(store, exchange(code), NOW + 1000)).resolves.toEqual({
				userId: "editor-1",
				scope: "mcp",
			});
		});

		it("should only succeed once", async () => {
			const code = await issueCode();
			await redeemAuthorizationCode(store, exchange(code), NOW);
			await expect(redeemAuthorizationCode(store, exchange(code), NOW)).resolves.toBeNull();
		});

		it("should reject a code issued to another client and leave it usable", async () => {
			const code = await issueCode();
			await expect(
				redeemAuthorizationCode(store, { ...exchange(code), clientId: "client-2" }, NOW),
			).resolves.toBeNull();
			await expect(redeemAuthorizationCode(store, exchange(code), NOW)).resolves.not.toBeNull();
		});

		it("should accept a code at its expiry instant", async () => {
			const code = await issueCode();
			await expect(redeemAuthorizationCode(store, exchange(code), NOW + 600_000)).resolves.not.toBeNull();
		});

		it("should reject an expired code", async () => {
			const code = await issueCode();
			await expect(redeemAuthorizationCode(store, exchange(code), NOW + 600_001)).resolves.toBeNull();
		});

		it("should burn the code on a redirect mismatch", async () => {
			const code = await issueCode();
			await expect(
				redeemAuthorizationCode(store, { ...exchange(code), redirectUri: `${TEST_REDIRECT_URI}/` }, NOW),
			).resolves.toBeNull();
			await expect(redeemAuthorizationCode(store, exchange(code), NOW)).resolves.toBeNull();
		});

		it("should burn the code on a PKCE mismatch", async () => {
			const code = await issueCode();
			await expect(
				redeemAuthorizationCode(store, { ...exchange(code), codeVerifier: "wrong-verifier" }, NOW),
			).resolves.toBeNull();
			await expect(redeemAuthorizationCode(store, exchange(code), NOW)).resolves.toBeNull();
		});
	});

	describe("access tokens", () => {
		const grant = { clientId: "client-1", userId: "editor-1", scope: "mcp" };

		it("should resolve a fresh token to its principal", async () => {
			const { accessToken, expiresIn } = await createAccessToken(store, grant, NOW);
			expect(expiresIn).toBe(3600);
			await expect(validateAccessToken(store, accessToken, NOW + 1000)).resolves.toEqual(grant);
		});

		it("should reject unknown tokens", async () => {
			await expect(validateAccessToken(store, "unknown-token", NOW)).resolves.toBeNull();
		});

		it("should delete a token once it has expired", async () => {
			const { accessToken } = await createAccessToken(store, grant, NOW);
			await expect(validateAccessToken(store, accessToken, NOW + 3_600_000)).resolves.toEqual(grant);
			await expect(validateAccessToken(store, accessToken, NOW + 3_600_001)).resolves.toBeNull();
			await expect(store.getAccessToken(hashToken(accessToken))).resolves.toBeNull();
		});
	});

	describe("sweepExpiredCredentials", () => {
		it("should delete only expired codes and tokens", async () => {
			await issueCode(NOW - 700_000);
			const liveCode = await issueCode(NOW);
			await createAccessToken(store, { clientId: "client-1", userId: "editor-1", scope: "mcp" }, NOW - 4_000_000);

			await expect(sweepExpiredCredentials(store, NOW)).resolves.toEqual({ codes: 1, tokens: 1 });
			await expect(store.consumeAuthorizationCode(hashToken(liveCode), "client-1")).resolves.not.toBeNull();
		});
	});
});
