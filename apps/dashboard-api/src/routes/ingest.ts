/**
 * Ingest Routes
 *
 * Queue ingestion tasks and manage them. Progress is streamed over
 * /ws/ingest/{taskId}.
 */

import { createRoute, z } from "@hono/zod-openapi";
import {
	COUNT_MODES,
	type IngestRequest,
	isTerminal,
	parseIngestRequest,
	summarizeResult,
	type TaskInfo,
} from "@secsearch/tasks";
import type { AppContext } from "../context.js";
import { badRequest, conflict, errorResponse, notFound } from "../errors.js";
import { createRouter } from "../router.js";

// ============================================
// Schemas
// ============================================

const IngestBodySchema = z
	.object({
		tickers: z.array(z.string()).min(1).describe("Ticker symbols"),
		formTypes: z.array(z.string()).optional().describe("Defaults to 10-K and 10-Q"),
		countMode: z.enum(COUNT_MODES).optional(),
		count: z.number().int().min(1).optional(),
		year: z.number().int().min(1993).optional(),
		startDate: z.string().optional().describe("YYYY-MM-DD"),
		endDate: z.string().optional().describe("YYYY-MM-DD"),
	})
	.openapi("IngestRequest");

const TaskCreatedSchema = z.object({
	taskId: z.string(),
	status: z.literal("pending"),
	websocketUrl: z.string(),
});

const TASK_STATUSES = ["pending", "running", "completed", "failed", "cancelled"] as const;

const TaskStatusSchema = z
	.object({
		taskId: z.string(),
		status: z.enum(TASK_STATUSES),
		tickers: z.array(z.string()),
		formTypes: z.array(z.string()),
		progress: z.object({
			currentTicker: z.string().nullable(),
			currentFormType: z.string().nullable(),
			stepLabel: z.string(),
			stepIndex: z.number(),
			stepTotal: z.number(),
			filingsDone: z.number(),
			filingsTotal: z.number(),
			filingsSkipped: z.number(),
			filingsFailed: z.number(),
		}),
		results: z.array(
			z.object({
				ticker: z.string(),
				formType: z.string(),
				filingDate: z.string(),
				accessionNumber: z.string(),
				segments: z.number(),
				chunks: z.number(),
				time: z.number(),
			}),
		),
		error: z.string().nullable(),
		createdAt: z.string(),
		startedAt: z.string().nullable(),
		completedAt: z.string().nullable(),
	})
	.openapi("TaskStatus");

const TaskParamSchema = z.object({ taskId: z.string().min(1) });

// ============================================
// Mapping
// ============================================

function toTaskStatus(task: TaskInfo): z.infer<typeof TaskStatusSchema> {
	return {
		taskId: task.taskId,
		status: task.status,
		tickers: task.request.tickers,
		formTypes: task.request.formTypes,
		progress: task.progress,
		results: task.results.map(summarizeResult),
		error: task.error,
		createdAt: task.createdAt.toISOString(),
		startedAt: task.startedAt?.toISOString() ?? null,
		completedAt: task.completedAt?.toISOString() ?? null,
	};
}

export function websocketUrl(taskId: string): string {
	return `/ws/ingest/${taskId}`;
}

// ============================================
// Routes
// ============================================

const created = {
	202: {
		content: { "application/json": { schema: TaskCreatedSchema } },
		description: "Task queued",
	},
	400: errorResponse("Invalid request"),
};

const addRoute = createRoute({
	method: "post",
	path: "/add",
	request: {
		body: { content: { "application/json": { schema: IngestBodySchema } } },
	},
	responses: created,
	tags: ["Ingest"],
});

const batchRoute = createRoute({
	method: "post",
	path: "/batch",
	request: {
		body: { content: { "application/json": { schema: IngestBodySchema } } },
	},
	responses: created,
	tags: ["Ingest"],
});

const listRoute = createRoute({
	method: "get",
	path: "/tasks",
	responses: {
		200: {
			content: {
				"application/json": {
					schema: z.object({ tasks: z.array(TaskStatusSchema), total: z.number() }),
				},
			},
			description: "All tracked tasks, oldest first",
		},
	},
	tags: ["Ingest"],
});

const getRoute = createRoute({
	method: "get",
	path: "/tasks/{taskId}",
	request: { params: TaskParamSchema },
	responses: {
		200: {
			content: { "application/json": { schema: TaskStatusSchema } },
			description: "Task status",
		},
		404: errorResponse("Task not found"),
	},
	tags: ["Ingest"],
});

const cancelRoute = createRoute({
	method: "delete",
	path: "/tasks/{taskId}",
	request: { params: TaskParamSchema },
	responses: {
		200: {
			content: {
				"application/json": {
					schema: z.object({ taskId: z.string(), status: z.literal("cancelling") }),
				},
			},
			description: "Cancellation requested",
		},
		404: errorResponse("Task not found"),
		409: errorResponse("Task already finished"),
	},
	tags: ["Ingest"],
});

export function ingestRoutes({ services }: AppContext) {
	const app = createRouter();
	const { tasks } = services;

	const queue = (request: IngestRequest) => {
		const taskId = tasks.createTask(request);
		return { taskId, status: "pending" as const, websocketUrl: websocketUrl(taskId) };
	};

	app.openapi(addRoute, (c) => {
		const body = c.req.valid("json");
		if (body.tickers.length !== 1) {
			throw badRequest(
				"The /add endpoint accepts exactly one ticker.",
				`Received ${body.tickers.length} tickers. Use /api/ingest/batch for several.`,
			);
		}
		return c.json(queue(parseIngestRequest(body)), 202);
	});

	app.openapi(batchRoute, (c) => c.json(queue(parseIngestRequest(c.req.valid("json"))), 202));

	app.openapi(listRoute, (c) => {
		const all = tasks.listTasks().map(toTaskStatus);
		return c.json({ tasks: all, total: all.length }, 200);
	});

	app.openapi(getRoute, (c) => {
		const { taskId } = c.req.valid("param");
		const task = tasks.getTask(taskId);
		if (!task) {
			throw notFound(`Task '${taskId}' not found.`);
		}
		return c.json(toTaskStatus(task), 200);
	});

	app.openapi(cancelRoute, (c) => {
		const { taskId } = c.req.valid("param");
		const task = tasks.getTask(taskId);
		if (!task) {
			throw notFound(`Task '${taskId}' not found.`);
		}
		if (isTerminal(task.status) || !tasks.cancelTask(taskId)) {
			throw conflict(`Task '${taskId}' has already finished (${task.status}).`);
		}
		return c.json({ taskId, status: "cancelling" as const }, 200);
	});

	return app;
}
