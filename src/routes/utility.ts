/**
 * Utility Routes
 */

import { Hono } from "hono";
import type { AppEnv } from "../app.js";

const utilityRoutes = new Hono<AppEnv>();

/**
 * GET /health
 */
utilityRoutes.get("/health", (c) => {
	return c.json({ status: "ok" });
});

export default utilityRoutes;
