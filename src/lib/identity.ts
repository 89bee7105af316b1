/**
 * Identity Resolver
 *
 * The gateway does not run its own login. The host application signs the user
 * in and leaves a signed cookie whose value is the user id; the authorize
 * endpoint reads it through a UserResolver.
 */

import type { Context } from "hono";
import { getSignedCookie } from "hono/cookie";

export interface UserResolver {
	/** The signed-in user's id, or null when nobody is signed in */
	resolve(c: Context): Promise<string | null>;
}

export function signedCookieUserResolver(secret: string, cookieName: string): UserResolver {
	return {
		async resolve(c) {
			const value = await getSignedCookie(c, secret, cookieName);
			return typeof value === "string" && value !== "" ? value : null;
		},
	};
}
