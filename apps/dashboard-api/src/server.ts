/**
 * Dashboard API Server
 *
 * Loads settings, builds the services and serves the app on Node.
 */

import { serve } from "@hono/node-server";
import { loadSettings } from "@secsearch/config";
import { errorMessage } from "@secsearch/domain";
import { createServices } from "@secsearch/runtime";
import { API_VERSION, createApp } from "./app.js";
import log from "./logger.js";

const settings = await loadSettings();
const services = await createServices(settings);
const { app, injectWebSocket } = createApp({ services, version: API_VERSION });

services.tasks.start();

const { host, port } = settings.api;
const server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
	log.info({ url: `http://${host}:${info.port}` }, "Dashboard API server ready");
});
injectWebSocket(server);

// ============================================
// Shutdown
// ============================================

let shuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
	if (shuttingDown) {
		return;
	}
	shuttingDown = true;
	log.info({ signal }, "Received shutdown signal, initiating graceful shutdown");

	await new Promise<void>((resolve) => server.close(() => resolve()));
	await services.close();
	log.info("Dashboard API server shutdown complete");
	await log.flush();
	process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.on(signal, () => {
		gracefulShutdown(signal).catch((error: unknown) => {
			log.error({ error: errorMessage(error) }, "Shutdown failed");
			process.exit(1);
		});
	});
}
