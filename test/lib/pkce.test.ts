import { describe, it, expect } from "vitest";
import { computeS256Challenge, verifyPkce } from "../../src/lib/pkce.js";

// RFC 7636 Appendix B
const VERIFIER = "dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk";
const CHALLENGE = "E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM";

describe("computeS256Challenge", () => {
	it("should produce base64url without padding", () => {
		expect(computeS256Challenge(VERIFIER)).toBe(CHALLENGE);
	});
});

describe("verifyPkce", () => {
	it("should accept a matching S256 verifier", () => {
		expect(verifyPkce(VERIFIER, CHALLENGE, "S256")).toBe(true);
	});

	it("should reject a wrong S256 verifier", () => {
		expect(verifyPkce(`${VERIFIER}x`, CHALLENGE, "S256")).toBe(false);
	});

	it("should not accept the challenge itself as an S256 verifier", () => {
		expect(verifyPkce(CHALLENGE, CHALLENGE, "S256")).toBe(false);
	});

	it("should compare plain verifiers directly", () => {
		expect(verifyPkce("plain-verifier", "plain-verifier", "plain")).toBe(true);
		expect(verifyPkce("plain-verifier", "other-verifier", "plain")).toBe(false);
	});
});
