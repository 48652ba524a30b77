/**
 * Service wiring tests: one ingest and one search through the composed
 * services, with every external system replaced in process.
 */

import { DEFAULT_SETTINGS, type Settings } from "@secsearch/config";
import type { EdgarSource } from "@secsearch/filings";
import { createMockEdgarSource, MockHelixDB, MockModelLoader } from "@secsearch/mocks";
import { createInMemoryClient } from "@secsearch/storage";
import { parseIngestRequest } from "@secsearch/tasks";
import { describe, expect, test } from "vitest";
import { createServices } from "./services.js";

async function services(
	settings: Settings = DEFAULT_SETTINGS,
	withEdgar = true,
	edgar: EdgarSource = createMockEdgarSource(),
) {
	return createServices(settings, {
		sqlite: await createInMemoryClient(),
		helixTransport: new MockHelixDB(),
		modelLoader: new MockModelLoader(),
		edgar: withEdgar ? edgar : undefined,
	});
}

describe("createServices", () => {
	test("ingests through the task manager and finds the filing by search", async () => {
		const svc = await services();

		const request = parseIngestRequest({ tickers: ["ACME"], formTypes: ["10-K"] });
		const taskId = svc.tasks.createTask(request);
		await svc.tasks.waitForIdle();

		expect(svc.tasks.getTask(taskId)?.status).toBe("completed");
		const status = await svc.store.status();
		expect(status).toMatchObject({ filingCount: 1, maxFilings: 20, tickers: ["ACME"] });

		const results = await svc.search.search("Acme Sensors", { ticker: "ACME" });
		expect(results.length).toBeGreaterThan(0);
		expect(new Set(results.map((result) => result.accessionNumber))).toEqual(
			new Set(["0001000001-24-000010"]),
		);

		await svc.close();
		expect(svc.embedder.isLoaded).toBe(false);
	});

	test("needs an EDGAR identity only once filings are fetched", async () => {
		const svc = await services(DEFAULT_SETTINGS, false);

		expect(await svc.store.status()).toMatchObject({ filingCount: 0 });

		const taskId = svc.tasks.createTask(parseIngestRequest({ tickers: ["ACME"] }));
		await svc.tasks.waitForIdle();

		expect(svc.tasks.getTask(taskId)).toMatchObject({
			status: "failed",
			error: "SEC EDGAR identity is not configured",
		});
		await svc.close();
	});

	test("applies the configured filing limit", async () => {
		const svc = await services({
			...DEFAULT_SETTINGS,
			database: { ...DEFAULT_SETTINGS.database, maxFilings: 7 },
		});

		expect(svc.registry.limit).toBe(7);
		expect(svc.fetcher.maxFilings).toBe(7);
		await svc.close();
	});

	test("close cancels a running task and waits for it before closing the stores", async () => {
		const inner = createMockEdgarSource();
		let release = (): void => {};
		const held = new Promise<void>((resolve) => {
			release = resolve;
		});
		let listingStarted = (): void => {};
		const listing = new Promise<void>((resolve) => {
			listingStarted = resolve;
		});
		const svc = await services(DEFAULT_SETTINGS, true, {
			listFilings: async (ticker, formType) => {
				listingStarted();
				await held;
				return inner.listFilings(ticker, formType);
			},
			getFilingHtml: (filing) => inner.getFilingHtml(filing),
		});

		const taskId = svc.tasks.createTask(
			parseIngestRequest({ tickers: ["ACME"], formTypes: ["10-K"] }),
		);
		await listing;

		let closed = false;
		const closing = svc.close().then(() => {
			closed = true;
		});
		await new Promise((resolve) => setTimeout(resolve, 20));
		expect(closed).toBe(false);

		release();
		await closing;

		expect(svc.tasks.getTask(taskId)?.status).toBe("cancelled");
		expect(svc.tasks.hasActiveTask()).toBe(false);
		await expect(svc.registry.count()).rejects.toThrow();
	});
});
