/**
 * Search Routes
 */

import { createRoute, z } from "@hono/zod-openapi";
import { CONTENT_TYPES, SUPPORTED_FORMS } from "@secsearch/domain";
import type { AppContext } from "../context.js";
import { errorResponse } from "../errors.js";
import { createRouter } from "../router.js";

// ============================================
// Schemas
// ============================================

const SearchRequestSchema = z
	.object({
		query: z.string().describe("Natural language query"),
		topK: z.number().int().min(1).max(100).optional(),
		ticker: z.string().optional(),
		formType: z.string().optional(),
		minSimilarity: z.number().min(0).max(1).optional(),
		accessionNumber: z.string().optional(),
	})
	.openapi("SearchRequest");

const SearchResultSchema = z
	.object({
		content: z.string(),
		path: z.string(),
		contentType: z.enum(CONTENT_TYPES),
		ticker: z.string(),
		formType: z.enum(SUPPORTED_FORMS),
		similarity: z.number(),
		filingDate: z.string(),
		accessionNumber: z.string(),
		chunkId: z.string(),
	})
	.openapi("SearchResult");

const SearchResponseSchema = z.object({
	query: z.string(),
	results: z.array(SearchResultSchema),
	totalResults: z.number(),
	searchTimeMs: z.number(),
});

// ============================================
// Routes
// ============================================

const searchRoute = createRoute({
	method: "post",
	path: "/",
	request: {
		body: { content: { "application/json": { schema: SearchRequestSchema } } },
	},
	responses: {
		200: {
			content: { "application/json": { schema: SearchResponseSchema } },
			description: "Chunks ranked by similarity",
		},
		400: errorResponse("Empty query or invalid parameters"),
		500: errorResponse("Search failed"),
	},
	tags: ["Search"],
});

export function searchRoutes({ services }: AppContext) {
	const app = createRouter();

	app.openapi(searchRoute, async (c) => {
		const { query, ...options } = c.req.valid("json");
		const startedAt = performance.now();
		const results = await services.search.search(query, options);
		const searchTimeMs = Math.round((performance.now() - startedAt) * 100) / 100;

		return c.json({ query, results, totalResults: results.length, searchTimeMs }, 200);
	});

	return app;
}
