/**
 * Ingest progress over WebSocket.
 *
 * Each connection reads the task's event stream and forwards every message
 * as JSON. Closing the socket stops the reader; the task keeps running.
 */

import type { createNodeWebSocket } from "@hono/node-ws";
import { errorMessage } from "@secsearch/domain";
import { type StreamOptions, streamTaskEvents, type TaskManager } from "@secsearch/tasks";
import { Hono } from "hono";
import log from "./logger.js";

type UpgradeWebSocket = ReturnType<typeof createNodeWebSocket>["upgradeWebSocket"];

/** Close code sent when the requested task does not exist */
export const TASK_NOT_FOUND_CLOSE_CODE = 4404;

export interface MessageSink {
	send(data: string): void;
	close(code?: number, reason?: string): void;
}

/**
 * Forward stream messages to the sink until the task finishes or the
 * signal aborts.
 */
export async function forwardTaskEvents(
	tasks: TaskManager,
	taskId: string,
	sink: MessageSink,
	options: StreamOptions = {},
): Promise<void> {
	for await (const message of streamTaskEvents(tasks, taskId, options)) {
		if (options.signal?.aborted) {
			return;
		}
		sink.send(JSON.stringify(message));
		if (message.type === "error") {
			sink.close(TASK_NOT_FOUND_CLOSE_CODE, "Task not found");
			return;
		}
	}

	if (!options.signal?.aborted) {
		sink.close(1000, "Task finished");
	}
}

/**
 * Socket routes, mounted under /ws.
 */
export function socketRoutes(upgradeWebSocket: UpgradeWebSocket, tasks: TaskManager) {
	const app = new Hono();

	app.get(
		"/ingest/:taskId",
		upgradeWebSocket((c) => {
			const taskId = c.req.param("taskId");
			const controller = new AbortController();

			return {
				onOpen(_event, ws) {
					log.debug({ taskId: taskId.slice(0, 8) }, "Ingest stream opened");
					forwardTaskEvents(
						tasks,
						taskId,
						{
							send: (data) => ws.send(data),
							close: (code, reason) => ws.close(code, reason),
						},
						{ signal: controller.signal },
					).catch((error: unknown) => {
						log.error({ taskId, error: errorMessage(error) }, "Ingest stream failed");
						ws.close(1011, "Internal error");
					});
				},
				onClose() {
					controller.abort();
				},
			};
		}),
	);

	return app;
}
