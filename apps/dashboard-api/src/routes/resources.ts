/**
 * Resource Routes
 *
 * Inspect and release the embedding model.
 */

import { createRoute, z } from "@hono/zod-openapi";
import type { AppContext } from "../context.js";
import { conflict, errorResponse } from "../errors.js";
import { createRouter } from "../router.js";

const ModelStatusSchema = z
	.object({
		modelLoaded: z.boolean(),
		device: z.string().nullable(),
		modelName: z.string(),
		approximateVramMb: z.number().nullable(),
	})
	.openapi("ModelStatus");

const statusRoute = createRoute({
	method: "get",
	path: "/gpu",
	responses: {
		200: {
			content: { "application/json": { schema: ModelStatusSchema } },
			description: "Embedding model state",
		},
	},
	tags: ["Resources"],
});

const unloadRoute = createRoute({
	method: "delete",
	path: "/gpu",
	responses: {
		200: {
			content: {
				"application/json": {
					schema: z.object({ status: z.enum(["unloaded", "already_unloaded"]) }),
				},
			},
			description: "Model released",
		},
		409: errorResponse("Tasks are still active"),
	},
	tags: ["Resources"],
});

export function resourceRoutes({ services }: AppContext) {
	const app = createRouter();
	const { embedder, tasks } = services;

	// Reading the state never loads the model
	app.openapi(statusRoute, (c) =>
		c.json(
			{
				modelLoaded: embedder.isLoaded,
				device: embedder.device,
				modelName: embedder.modelName,
				approximateVramMb: embedder.approximateVramMb,
			},
			200,
		),
	);

	app.openapi(unloadRoute, (c) => {
		if (tasks.hasActiveTask()) {
			throw conflict(
				"Cannot unload model while tasks are active.",
				"Wait for running tasks to complete or cancel them first.",
			);
		}
		if (!embedder.isLoaded) {
			return c.json({ status: "already_unloaded" as const }, 200);
		}
		embedder.unload();
		return c.json({ status: "unloaded" as const }, 200);
	});

	return app;
}
