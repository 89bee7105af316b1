/**
 * Configuration
 *
 * Parses and validates environment variables.
 */

import { z } from "zod";

const booleanFlag = z
	.enum(["true", "false", "1", "0"])
	.default("true")
	.transform((value) => value === "true" || value === "1");

const configSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(3000),
	HOST: z.string().min(1).default("0.0.0.0"),
	PUBLIC_BASE_URL: z
		.string()
		.url()
		.transform((url) => url.replace(/\/+$/, ""))
		.optional()
		.describe("External origin; defaults to the request origin"),
	DATABASE_PATH: z.string().min(1).default("./data/gateway.db"),
	LOGIN_URL: z.string().min(1).default("/login"),
	USER_COOKIE_NAME: z.string().min(1).default("cms_user"),
	USER_COOKIE_SECRET: z
		.string({ required_error: "USER_COOKIE_SECRET is required" })
		.min(16, "USER_COOKIE_SECRET must be at least 16 characters"),
	CONTENT_API_URL: z.string({ required_error: "CONTENT_API_URL is required" }).url(),
	CONTENT_API_TOKEN: z.string().min(1).optional(),
	LOG_REQUESTS: booleanFlag,
});

export interface Config {
	port: number;
	host: string;
	publicBaseUrl?: string;
	databasePath: string;
	loginUrl: string;
	userCookieName: string;
	userCookieSecret: string;
	contentApiUrl: string;
	contentApiToken?: string;
	logRequests: boolean;
}

/**
 * Load configuration from the environment. Empty variables count as unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
	const present: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value !== "") {
			present[key] = value;
		}
	}

	const parsed = configSchema.safeParse(present);
	if (!parsed.success) {
		const issues = parsed.error.errors.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`);
		throw new Error(`Invalid configuration:\n${issues.join("\n")}`);
	}

	const values = parsed.data;
	return {
		port: values.PORT,
		host: values.HOST,
		publicBaseUrl: values.PUBLIC_BASE_URL,
		databasePath: values.DATABASE_PATH,
		loginUrl: values.LOGIN_URL,
		userCookieName: values.USER_COOKIE_NAME,
		userCookieSecret: values.USER_COOKIE_SECRET,
		contentApiUrl: values.CONTENT_API_URL,
		contentApiToken: values.CONTENT_API_TOKEN,
		logRequests: values.LOG_REQUESTS,
	};
}
