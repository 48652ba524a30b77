/**
 * Dashboard API tests, run against the composed app with every external
 * system replaced in process.
 */

import { DEFAULT_SETTINGS } from "@secsearch/config";
import type { EdgarSource } from "@secsearch/filings";
import { createMockEdgarSource, MockHelixDB, MockModelLoader } from "@secsearch/mocks";
import { createServices, type Services } from "@secsearch/runtime";
import { createInMemoryClient } from "@secsearch/storage";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { z } from "zod";
import { createApp } from "./app.js";

// ============================================
// Harness
// ============================================

const TaskCreatedSchema = z.object({
	taskId: z.string(),
	status: z.string(),
	websocketUrl: z.string(),
});

const FilingListSchema = z.object({
	filings: z.array(z.object({ ticker: z.string(), accessionNumber: z.string(), chunkCount: z.number() })),
	total: z.number(),
});

let services: Services;
let app: ReturnType<typeof createApp>["app"];

async function build(edgar: EdgarSource = createMockEdgarSource()): Promise<void> {
	services = await createServices(DEFAULT_SETTINGS, {
		sqlite: await createInMemoryClient(),
		helixTransport: new MockHelixDB(),
		modelLoader: new MockModelLoader(),
		edgar,
	});
	app = createApp({ services, version: "9.9.9-test" }).app;
}

/**
 * EDGAR listings held back until released, so a task stays active.
 */
async function buildWithHeldListings(): Promise<() => void> {
	const inner = createMockEdgarSource();
	let release = (): void => {};
	const held = new Promise<void>((resolve) => {
		release = resolve;
	});

	await services.close();
	await build({
		listFilings: async (ticker, formType) => {
			await held;
			return inner.listFilings(ticker, formType);
		},
		getFilingHtml: (listing) => inner.getFilingHtml(listing),
	});
	return release;
}

beforeEach(async () => {
	await build();
});

afterEach(async () => {
	await services.close();
});

function post(path: string, body: unknown) {
	return app.request(path, {
		method: "POST",
		headers: { "Content-Type": "application/json" },
		body: JSON.stringify(body),
	});
}

function del(path: string) {
	return app.request(path, { method: "DELETE" });
}

async function ingest(body: unknown): Promise<string> {
	const res = await post("/api/ingest/batch", body);
	expect(res.status).toBe(202);
	const { taskId } = TaskCreatedSchema.parse(await res.json());
	await services.tasks.waitForIdle();
	return taskId;
}

// ============================================
// System
// ============================================

describe("system routes", () => {
	test("GET /api/health reports the version", async () => {
		const res = await app.request("/api/health");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "ok", version: "9.9.9-test" });
	});

	test("GET /api/status summarises stored filings", async () => {
		await ingest({ tickers: ["ACME"], formTypes: ["10-K"] });

		const res = await app.request("/api/status");

		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({
			filingCount: 1,
			maxFilings: 20,
			tickers: ["ACME"],
			formBreakdown: { "10-K": 1 },
		});
	});

	test("unknown routes return a not_found body", async () => {
		const res = await app.request("/api/nothing-here");

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({
			error: "not_found",
			message: "No route for GET /api/nothing-here",
			details: null,
			hint: null,
		});
	});
});

// ============================================
// Ingest
// ============================================

describe("ingest routes", () => {
	test("POST /api/ingest/add queues a task and reports its websocket", async () => {
		const res = await post("/api/ingest/add", { tickers: ["acme"], formTypes: ["10-K"] });

		expect(res.status).toBe(202);
		const created = TaskCreatedSchema.parse(await res.json());
		expect(created.status).toBe("pending");
		expect(created.taskId).toMatch(/^[0-9a-f]{32}$/);
		expect(created.websocketUrl).toBe(`/ws/ingest/${created.taskId}`);

		await services.tasks.waitForIdle();

		const status = await app.request(`/api/ingest/tasks/${created.taskId}`);
		expect(status.status).toBe(200);
		expect(await status.json()).toMatchObject({
			taskId: created.taskId,
			status: "completed",
			tickers: ["ACME"],
			formTypes: ["10-K"],
			error: null,
			results: [{ ticker: "ACME", formType: "10-K", accessionNumber: "0001000001-24-000010" }],
		});
	});

	test("POST /api/ingest/add rejects more than one ticker", async () => {
		const res = await post("/api/ingest/add", { tickers: ["ACME", "BOLT"] });

		expect(res.status).toBe(400);
		expect(await res.json()).toMatchObject({
			error: "validation_error",
			message: "The /add endpoint accepts exactly one ticker.",
			details: "Received 2 tickers. Use /api/ingest/batch for several.",
		});
	});

	test("unsupported form types are rejected", async () => {
		const res = await post("/api/ingest/batch", { tickers: ["ACME"], formTypes: ["8-K"] });

		expect(res.status).toBe(400);
		expect(await res.json()).toMatchObject({
			error: "validation_error",
			message: "Unsupported form type(s): 8-K. Supported: 10-K, 10-Q",
		});
	});

	test("malformed bodies fail request validation", async () => {
		const res = await post("/api/ingest/batch", { tickers: [], year: 1980 });

		expect(res.status).toBe(400);
		expect(await res.json()).toMatchObject({
			error: "validation_error",
			message: "Invalid request",
		});
	});

	test("GET /api/ingest/tasks lists every task", async () => {
		const first = await ingest({ tickers: ["ACME"], formTypes: ["10-K"] });
		const second = await ingest({ tickers: ["ACME"], formTypes: ["10-K"] });

		const res = await app.request("/api/ingest/tasks");

		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({
			total: 2,
			tasks: [
				{ taskId: first, status: "completed" },
				{ taskId: second, status: "completed", progress: { filingsSkipped: 1 } },
			],
		});
	});

	test("unknown tasks are 404", async () => {
		const res = await app.request("/api/ingest/tasks/nope");

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({
			error: "not_found",
			message: "Task 'nope' not found.",
			details: null,
			hint: null,
		});
		expect((await del("/api/ingest/tasks/nope")).status).toBe(404);
	});

	test("cancelling a finished task is a conflict", async () => {
		const taskId = await ingest({ tickers: ["ACME"], formTypes: ["10-K"] });

		const res = await del(`/api/ingest/tasks/${taskId}`);

		expect(res.status).toBe(409);
		expect(await res.json()).toMatchObject({
			error: "conflict",
			message: `Task '${taskId}' has already finished (completed).`,
		});
	});

	test("cancelling an active task reports cancelling", async () => {
		const release = await buildWithHeldListings();
		const res = await post("/api/ingest/batch", { tickers: ["ACME"], formTypes: ["10-K"] });
		const { taskId } = TaskCreatedSchema.parse(await res.json());

		const cancel = await del(`/api/ingest/tasks/${taskId}`);

		expect(cancel.status).toBe(200);
		expect(await cancel.json()).toEqual({ taskId, status: "cancelling" });
		release();
		await services.tasks.waitForIdle();
		expect(services.tasks.getTask(taskId)?.status).toBe("cancelled");
	});
});

// ============================================
// Filings
// ============================================

describe("filings routes", () => {
	beforeEach(async () => {
		await ingest({ tickers: ["ACME", "BOLT"], formTypes: ["10-K"] });
	});

	test("GET /api/filings sorts newest filing first by default", async () => {
		const res = await app.request("/api/filings");

		expect(res.status).toBe(200);
		const body = FilingListSchema.parse(await res.json());
		expect(body.total).toBe(2);
		expect(body.filings.map((filing) => filing.accessionNumber)).toEqual([
			"0002000002-24-000005",
			"0001000001-24-000010",
		]);
	});

	test("GET /api/filings filters and sorts by the requested key", async () => {
		const sorted = FilingListSchema.parse(
			await (await app.request("/api/filings?sort_by=ticker&order=asc")).json(),
		);
		expect(sorted.filings.map((filing) => filing.ticker)).toEqual(["ACME", "BOLT"]);

		const filtered = FilingListSchema.parse(
			await (await app.request("/api/filings?ticker=bolt")).json(),
		);
		expect(filtered.filings.map((filing) => filing.ticker)).toEqual(["BOLT"]);
	});

	test("GET /api/filings rejects an unknown sort key", async () => {
		const res = await app.request("/api/filings?sort_by=size");

		expect(res.status).toBe(400);
	});

	test("GET /api/filings/:accession returns the record or 404", async () => {
		const found = await app.request("/api/filings/0001000001-24-000010");
		expect(found.status).toBe(200);
		expect(await found.json()).toMatchObject({
			ticker: "ACME",
			formType: "10-K",
			filingDate: "2024-02-20",
		});

		const missing = await app.request("/api/filings/0000000000-00-000000");
		expect(missing.status).toBe(404);
		expect(await missing.json()).toMatchObject({
			message: "Filing not found: 0000000000-00-000000",
		});
	});

	test("DELETE /api/filings/:accession removes the filing and its chunks", async () => {
		const record = await services.registry.getFiling("0001000001-24-000010");

		const res = await del("/api/filings/0001000001-24-000010");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			accessionNumber: "0001000001-24-000010",
			chunksDeleted: record?.chunkCount,
		});
		expect((await app.request("/api/filings/0001000001-24-000010")).status).toBe(404);
		expect((await del("/api/filings/0001000001-24-000010")).status).toBe(404);
	});

	test("POST /api/filings/bulk-delete needs a filter", async () => {
		const rejected = await post("/api/filings/bulk-delete", {});
		expect(rejected.status).toBe(400);
		expect(await rejected.json()).toMatchObject({ message: "At least one filter is required" });

		const res = await post("/api/filings/bulk-delete", { ticker: "BOLT" });
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({ filingsDeleted: 1, tickersAffected: ["BOLT"] });
		expect(await services.registry.count()).toBe(1);
	});

	test("DELETE /api/filings clears everything only when confirmed", async () => {
		const rejected = await del("/api/filings");
		expect(rejected.status).toBe(400);
		expect(await rejected.json()).toMatchObject({ message: "Confirmation required" });
		expect(await services.registry.count()).toBe(2);

		const res = await del("/api/filings?confirm=true");
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({ filingsDeleted: 2 });
		expect(await services.registry.count()).toBe(0);
	});
});

// ============================================
// Search
// ============================================

describe("search routes", () => {
	test("POST /api/search returns ranked results for the filter", async () => {
		await ingest({ tickers: ["ACME", "BOLT"], formTypes: ["10-K"] });

		const res = await post("/api/search", { query: "Acme Sensors", ticker: "ACME", topK: 3 });

		expect(res.status).toBe(200);
		const body = z
			.object({
				query: z.string(),
				results: z.array(z.object({ ticker: z.string(), similarity: z.number() })),
				totalResults: z.number(),
				searchTimeMs: z.number(),
			})
			.parse(await res.json());
		expect(body.query).toBe("Acme Sensors");
		expect(body.results.length).toBeGreaterThan(0);
		expect(body.results.length).toBeLessThanOrEqual(3);
		expect(body.totalResults).toBe(body.results.length);
		expect(new Set(body.results.map((result) => result.ticker))).toEqual(new Set(["ACME"]));
	});

	test("an empty query is a 400", async () => {
		const res = await post("/api/search", { query: "   " });

		expect(res.status).toBe(400);
		expect(await res.json()).toMatchObject({
			error: "validation_error",
			message: "Empty search query",
			details: "Cannot search with an empty or whitespace-only query.",
		});
	});

	test("topK outside 1..100 fails validation", async () => {
		const res = await post("/api/search", { query: "revenue", topK: 500 });

		expect(res.status).toBe(400);
	});
});

// ============================================
// Resources
// ============================================

describe("resource routes", () => {
	test("GET /api/resources/gpu reports the model without loading it", async () => {
		const res = await app.request("/api/resources/gpu");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			modelLoaded: false,
			device: null,
			modelName: "mock-embedding",
			approximateVramMb: null,
		});
		expect(services.embedder.isLoaded).toBe(false);
	});

	test("DELETE /api/resources/gpu unloads a loaded model", async () => {
		expect(await (await del("/api/resources/gpu")).json()).toEqual({ status: "already_unloaded" });

		await services.embedder.load();

		const res = await del("/api/resources/gpu");
		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "unloaded" });
		expect(services.embedder.isLoaded).toBe(false);
	});

	test("DELETE /api/resources/gpu refuses while a task is active", async () => {
		const release = await buildWithHeldListings();
		await post("/api/ingest/batch", { tickers: ["ACME"], formTypes: ["10-K"] });

		const res = await del("/api/resources/gpu");

		expect(res.status).toBe(409);
		expect(await res.json()).toEqual({
			error: "conflict",
			message: "Cannot unload model while tasks are active.",
			details: null,
			hint: "Wait for running tasks to complete or cancel them first.",
		});
		release();
		await services.tasks.waitForIdle();
	});
});
