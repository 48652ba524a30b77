/**
 * Dashboard API
 *
 * REST routes for filings, search, ingestion and model resources, plus the
 * ingest progress WebSocket. Built per process around one Services instance.
 */

import { OpenAPIHono } from "@hono/zod-openapi";
import { createNodeWebSocket } from "@hono/node-ws";
import { cors } from "hono/cors";
import { logger as honoLogger } from "hono/logger";
import type { AppContext } from "./context.js";
import { handleError, notFound } from "./errors.js";
import log from "./logger.js";
import {
	filingsRoutes,
	ingestRoutes,
	resourceRoutes,
	searchRoutes,
	systemRoutes,
} from "./routes/index.js";
import { socketRoutes } from "./websocket.js";

export const API_VERSION = "0.1.0";

export type { AppContext } from "./context.js";

export function createApp(context: AppContext) {
	const { services } = context;
	const app = new OpenAPIHono();
	const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });

	// ============================================
	// Middleware
	// ============================================

	app.use(
		"/*",
		cors({
			origin: services.settings.api.corsOrigins,
			allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
			allowHeaders: ["Content-Type"],
			credentials: true,
		}),
	);

	app.use("/*", honoLogger((message) => log.debug(message)));

	app.onError(handleError);
	app.notFound((c) => handleError(notFound(`No route for ${c.req.method} ${c.req.path}`), c));

	// ============================================
	// Routes
	// ============================================

	app.route("/api", systemRoutes(context));
	app.route("/api/filings", filingsRoutes(context));
	app.route("/api/search", searchRoutes(context));
	app.route("/api/ingest", ingestRoutes(context));
	app.route("/api/resources", resourceRoutes(context));

	app.route("/ws", socketRoutes(upgradeWebSocket, services.tasks));

	app.doc("/openapi.json", {
		openapi: "3.0.0",
		info: {
			title: "SEC Filings Search API",
			version: context.version,
			description: "Ingest SEC 10-K and 10-Q filings and search them semantically",
		},
	});

	return { app, injectWebSocket };
}
