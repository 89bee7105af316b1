/**
 * String and request-body helpers
 */

import { MAX_RAW_RESPONSE_LENGTH } from "./constants.js";

/**
 * Truncate a string to maxLen characters, appending "..." if truncated
 */
export function truncate(str: string, maxLen: number): string {
	return str.length > maxLen ? `${str.substring(0, maxLen)}...` : str;
}

/**
 * Escape HTML special characters to prevent XSS
 */
export function escapeHtml(str: string): string {
	return str
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&#39;");
}

/**
 * Keep only the string-valued fields of a parsed form or JSON body.
 * Uploaded files, arrays and nested objects are dropped.
 */
export function stringFields(body: Record<string, unknown>): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(body)) {
		if (typeof value === "string") {
			result[key] = value;
		}
	}
	return result;
}

/**
 * Decode `Authorization: Basic` client credentials (RFC 6749 §2.3.1).
 * Both halves are form-encoded before base64.
 */
export function parseBasicCredentials(
	header: string | undefined,
): { clientId: string; clientSecret: string } | undefined {
	const match = header?.match(/^Basic\s+(\S+)$/i);
	if (!match) return undefined;

	const decoded = Buffer.from(match[1], "base64").toString("utf8");
	const separator = decoded.indexOf(":");
	if (separator < 0) return undefined;

	try {
		return {
			clientId: decodeURIComponent(decoded.slice(0, separator).replace(/\+/g, " ")),
			clientSecret: decodeURIComponent(decoded.slice(separator + 1).replace(/\+/g, " ")),
		};
	} catch {
		// Malformed percent-encoding
		return undefined;
	}
}

/**
 * Parse a content API response body: JSON when possible, otherwise the raw
 * text (truncated)
 */
export function parseResponse(text: string): unknown {
	if (text === "") return null;
	try {
		return JSON.parse(text);
	} catch {
		return {
			raw:
				text.length > MAX_RAW_RESPONSE_LENGTH
					? text.substring(0, MAX_RAW_RESPONSE_LENGTH)
					: text,
		};
	}
}
