import { describe, it, expect } from "vitest";
import { createTestApp } from "../setup.js";

describe("Utility routes", () => {
	it("GET /health should report ok", async () => {
		const { app } = createTestApp();
		const res = await app.request("/health");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "ok" });
	});

	it("should answer unknown paths with JSON", async () => {
		const { app } = createTestApp();
		const res = await app.request("/nope");

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: "not_found", message: "Not found" });
	});

	it("should set security headers", async () => {
		const { app } = createTestApp();
		const res = await app.request("/health");

		expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
		expect(res.headers.get("X-Frame-Options")).toBe("DENY");
		expect(res.headers.get("Content-Security-Policy")).toBe("default-src 'self'; style-src 'unsafe-inline'");
	});
});

describe("CORS", () => {
	it("should answer preflight on open paths with a wildcard", async () => {
		const { app } = createTestApp();
		const res = await app.request("/mcp", { method: "OPTIONS", headers: { Origin: "https://inspector.test" } });

		expect(res.status).toBe(204);
		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
		expect(res.headers.get("Access-Control-Allow-Headers")).toBe(
			"Content-Type, Authorization, Mcp-Session-Id, Mcp-Protocol-Version",
		);
	});

	it("should not open the consent page to other origins", async () => {
		const { app } = createTestApp();
		const res = await app.request("/oauth/authorize", {
			method: "OPTIONS",
			headers: { Origin: "https://attacker.test" },
		});

		expect(res.status).toBe(204);
		expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull();
	});

	it("should open the token endpoint", async () => {
		const { app } = createTestApp();
		const res = await app.request("/oauth/token", { method: "OPTIONS" });

		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
	});
});
