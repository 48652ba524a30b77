/**
 * System Routes
 *
 * Liveness and the store overview.
 */

import { createRoute, z } from "@hono/zod-openapi";
import type { AppContext } from "../context.js";
import { errorResponse } from "../errors.js";
import { createRouter } from "../router.js";

// ============================================
// Schemas
// ============================================

const HealthSchema = z.object({
	status: z.literal("ok"),
	version: z.string(),
});

const StatusSchema = z
	.object({
		filingCount: z.number(),
		maxFilings: z.number(),
		chunkCount: z.number(),
		tickers: z.array(z.string()),
		formBreakdown: z.record(z.string(), z.number()),
		tickerBreakdown: z.array(
			z.object({
				ticker: z.string(),
				filings: z.number(),
				chunks: z.number(),
				forms: z.array(z.string()),
			}),
		),
	})
	.openapi("StoreStatus");

// ============================================
// Routes
// ============================================

const healthRoute = createRoute({
	method: "get",
	path: "/health",
	responses: {
		200: {
			content: { "application/json": { schema: HealthSchema } },
			description: "Service is up",
		},
	},
	tags: ["System"],
});

const statusRoute = createRoute({
	method: "get",
	path: "/status",
	responses: {
		200: {
			content: { "application/json": { schema: StatusSchema } },
			description: "Filing and chunk counts",
		},
		500: errorResponse("Store unavailable"),
	},
	tags: ["System"],
});

export function systemRoutes({ services, version }: AppContext) {
	const app = createRouter();

	app.openapi(healthRoute, (c) => c.json({ status: "ok" as const, version }, 200));

	app.openapi(statusRoute, async (c) => c.json(await services.store.status(), 200));

	return app;
}
