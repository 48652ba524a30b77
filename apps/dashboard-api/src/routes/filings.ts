/**
 * Filings Routes
 *
 * Browse and delete ingested filings.
 */

import { createRoute, z } from "@hono/zod-openapi";
import { type FilingRecord, normalizeFormType, SUPPORTED_FORMS } from "@secsearch/domain";
import type { AppContext } from "../context.js";
import { badRequest, errorResponse, notFound } from "../errors.js";
import { createRouter } from "../router.js";

// ============================================
// Schemas
// ============================================

export const SORT_KEYS = ["filing_date", "ticker", "form_type", "chunk_count", "ingested_at"] as const;
type SortKey = (typeof SORT_KEYS)[number];

const FilingSchema = z
	.object({
		id: z.number(),
		ticker: z.string(),
		formType: z.enum(SUPPORTED_FORMS),
		filingDate: z.string(),
		accessionNumber: z.string(),
		chunkCount: z.number(),
		ingestedAt: z.string(),
	})
	.openapi("Filing");

const ListQuerySchema = z.object({
	ticker: z.string().optional(),
	form_type: z.string().optional(),
	sort_by: z.enum(SORT_KEYS).default("filing_date"),
	order: z.enum(["asc", "desc"]).default("desc"),
});

const AccessionParamSchema = z.object({
	accession: z.string().min(1),
});

const BulkDeleteSchema = z.object({
	ticker: z.string().optional(),
	formType: z.string().optional(),
});

const ClearQuerySchema = z.object({
	confirm: z.enum(["true", "false"]).optional(),
});

// ============================================
// Sorting
// ============================================

const COMPARATORS: Record<SortKey, (a: FilingRecord, b: FilingRecord) => number> = {
	filing_date: (a, b) => a.filingDate.localeCompare(b.filingDate),
	ticker: (a, b) => a.ticker.localeCompare(b.ticker),
	form_type: (a, b) => a.formType.localeCompare(b.formType),
	chunk_count: (a, b) => a.chunkCount - b.chunkCount,
	ingested_at: (a, b) => a.ingestedAt.localeCompare(b.ingestedAt),
};

export function sortFilings(
	filings: readonly FilingRecord[],
	sortBy: SortKey,
	order: "asc" | "desc",
): FilingRecord[] {
	const compare = COMPARATORS[sortBy];
	const sign = order === "asc" ? 1 : -1;
	return [...filings].sort((a, b) => sign * compare(a, b));
}

// ============================================
// Routes
// ============================================

const listRoute = createRoute({
	method: "get",
	path: "/",
	request: { query: ListQuerySchema },
	responses: {
		200: {
			content: {
				"application/json": {
					schema: z.object({ filings: z.array(FilingSchema), total: z.number() }),
				},
			},
			description: "Ingested filings",
		},
		400: errorResponse("Invalid filter"),
	},
	tags: ["Filings"],
});

const getRoute = createRoute({
	method: "get",
	path: "/{accession}",
	request: { params: AccessionParamSchema },
	responses: {
		200: {
			content: { "application/json": { schema: FilingSchema } },
			description: "Filing metadata",
		},
		404: errorResponse("Filing not found"),
	},
	tags: ["Filings"],
});

const deleteRoute = createRoute({
	method: "delete",
	path: "/{accession}",
	request: { params: AccessionParamSchema },
	responses: {
		200: {
			content: {
				"application/json": {
					schema: z.object({ accessionNumber: z.string(), chunksDeleted: z.number() }),
				},
			},
			description: "Filing and its chunks deleted",
		},
		404: errorResponse("Filing not found"),
	},
	tags: ["Filings"],
});

const bulkDeleteRoute = createRoute({
	method: "post",
	path: "/bulk-delete",
	request: {
		body: { content: { "application/json": { schema: BulkDeleteSchema } } },
	},
	responses: {
		200: {
			content: {
				"application/json": {
					schema: z.object({
						filingsDeleted: z.number(),
						chunksDeleted: z.number(),
						tickersAffected: z.array(z.string()),
					}),
				},
			},
			description: "Matching filings deleted",
		},
		400: errorResponse("No filter given"),
	},
	tags: ["Filings"],
});

const clearRoute = createRoute({
	method: "delete",
	path: "/",
	request: { query: ClearQuerySchema },
	responses: {
		200: {
			content: {
				"application/json": {
					schema: z.object({ filingsDeleted: z.number(), chunksDeleted: z.number() }),
				},
			},
			description: "All filings deleted",
		},
		400: errorResponse("Confirmation missing"),
	},
	tags: ["Filings"],
});

export function filingsRoutes({ services }: AppContext) {
	const app = createRouter();
	const { registry, store } = services;

	app.openapi(listRoute, async (c) => {
		const { ticker, form_type, sort_by, order } = c.req.valid("query");
		const filings = await registry.listFilings({
			ticker,
			formType: form_type === undefined ? undefined : normalizeFormType(form_type),
		});
		return c.json({ filings: sortFilings(filings, sort_by, order), total: filings.length }, 200);
	});

	app.openapi(getRoute, async (c) => {
		const { accession } = c.req.valid("param");
		const filing = await registry.getFiling(accession);
		if (!filing) {
			throw notFound(`Filing not found: ${accession}`);
		}
		return c.json(filing, 200);
	});

	app.openapi(deleteRoute, async (c) => {
		const { accession } = c.req.valid("param");
		if (!(await registry.getFiling(accession))) {
			throw notFound(`Filing not found: ${accession}`);
		}
		const { chunksDeleted } = await store.deleteFiling(accession);
		return c.json({ accessionNumber: accession, chunksDeleted }, 200);
	});

	app.openapi(bulkDeleteRoute, async (c) => {
		const { ticker, formType } = c.req.valid("json");
		if (!ticker && !formType) {
			throw badRequest(
				"At least one filter is required",
				"Provide ticker and/or formType. Use DELETE /api/filings?confirm=true to remove everything.",
			);
		}
		const result = await store.deleteByFilter({
			ticker: ticker || undefined,
			formType: formType ? normalizeFormType(formType) : undefined,
		});
		return c.json(result, 200);
	});

	app.openapi(clearRoute, async (c) => {
		const { confirm } = c.req.valid("query");
		if (confirm !== "true") {
			throw badRequest("Confirmation required", "Pass confirm=true to delete all filings.");
		}
		return c.json(await store.clearAll(), 200);
	});

	return app;
}
