/**
 * Random token generation, hashing and constant-time comparison
 */

import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

/**
 * Generate a random 64-char hex token (256 bits)
 */
export function generateSecureToken(): string {
	return randomBytes(32).toString("hex");
}

/**
 * Hash a value with SHA-256 (hex) for use as a store key or secret digest.
 * Prevents reuse of codes, tokens and client secrets if the store contents leak.
 */
export function hashToken(value: string): string {
	return createHash("sha256").update(value).digest("hex");
}

/**
 * Constant-time string comparison
 */
export function constantTimeEqual(a: string, b: string): boolean {
	const bufA = Buffer.from(a);
	const bufB = Buffer.from(b);
	if (bufA.byteLength !== bufB.byteLength) return false;
	return timingSafeEqual(bufA, bufB);
}
