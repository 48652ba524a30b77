/**
 * Filing Store Tests
 */

import {
	type Chunk,
	createChunkId,
	createFilingIdentifier,
	DatabaseError,
	type FilingIdentifier,
	type ProcessedFiling,
	type SearchResult,
} from "@secsearch/domain";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FilingStore } from "./filing-store.js";
import { runMigrations } from "./migrations.js";
import { FilingsRepository } from "./repositories/filings.js";
import { createInMemoryClient, type SqliteClient } from "./sqlite.js";
import type { VectorQuery, VectorStore } from "./vector-store.js";

// ============================================
// Fakes
// ============================================

class FakeVectorStore implements VectorStore {
	readonly chunks = new Map<string, Chunk[]>();
	failDeletes = false;

	async storeFiling(filing: ProcessedFiling): Promise<void> {
		this.chunks.set(filing.filingId.accessionNumber, [...filing.chunks]);
	}

	async deleteFiling(accessionNumber: string): Promise<number> {
		if (this.failDeletes) {
			throw new DatabaseError("vector store offline");
		}
		const count = this.chunks.get(accessionNumber)?.length ?? 0;
		this.chunks.delete(accessionNumber);
		return count;
	}

	async query(_query: VectorQuery): Promise<SearchResult[]> {
		return [];
	}

	async count(): Promise<number> {
		return [...this.chunks.values()].reduce((sum, chunks) => sum + chunks.length, 0);
	}
}

function processed(filingId: FilingIdentifier, chunkCount: number): ProcessedFiling {
	const chunks: Chunk[] = Array.from({ length: chunkCount }, (_, chunkIndex) => ({
		content: `chunk ${createChunkId(filingId, chunkIndex)}`,
		path: "(root)",
		contentType: "text",
		filingId,
		chunkIndex,
	}));
	return {
		filingId,
		segments: [],
		chunks,
		embeddings: chunks.map(() => [1, 0]),
		ingestResult: { filingId, segmentCount: 0, chunkCount, durationSeconds: 0.1 },
	};
}

const AAPL_10K = createFilingIdentifier({
	ticker: "AAPL",
	formType: "10-K",
	filingDate: "2024-11-01",
	accessionNumber: "0000320193-24-000123",
});
const AAPL_10Q = createFilingIdentifier({
	ticker: "AAPL",
	formType: "10-Q",
	filingDate: "2024-08-02",
	accessionNumber: "0000320193-24-000081",
});
const MSFT_10K = createFilingIdentifier({
	ticker: "MSFT",
	formType: "10-K",
	filingDate: "2024-07-30",
	accessionNumber: "0000950170-24-087843",
});

// ============================================
// Tests
// ============================================

describe("FilingStore", () => {
	let client: SqliteClient;
	let vectors: FakeVectorStore;
	let store: FilingStore;

	beforeEach(async () => {
		client = await createInMemoryClient();
		await runMigrations(client);
		vectors = new FakeVectorStore();
		store = new FilingStore(vectors, new FilingsRepository(client, 20));
	});

	afterEach(() => {
		client.close();
	});

	test("storeFiling writes both stores", async () => {
		const record = await store.storeFiling(processed(AAPL_10K, 3));

		expect(record.chunkCount).toBe(3);
		expect(await vectors.count()).toBe(3);
		expect(await store.registry.count()).toBe(1);
	});

	test("removes stored vectors when registration fails", async () => {
		await store.storeFiling(processed(AAPL_10K, 3));
		const twin = createFilingIdentifier({ ...AAPL_10K, accessionNumber: "0000320193-24-999999" });

		await expect(store.storeFiling(processed(twin, 2))).rejects.toThrow(
			"Filing already exists: 0000320193-24-999999",
		);

		expect(vectors.chunks.has(twin.accessionNumber)).toBe(false);
		expect(await vectors.count()).toBe(3);
	});

	test("rethrows the registration error even when cleanup fails", async () => {
		await store.storeFiling(processed(AAPL_10K, 1));
		vectors.failDeletes = true;
		const twin = createFilingIdentifier({ ...AAPL_10K, accessionNumber: "0000320193-24-999999" });

		await expect(store.storeFiling(processed(twin, 1))).rejects.toThrow("Filing already exists");
	});

	test("deleteFiling removes vectors then the record", async () => {
		await store.storeFiling(processed(AAPL_10K, 4));

		expect(await store.deleteFiling(AAPL_10K.accessionNumber)).toEqual({
			chunksDeleted: 4,
			removed: true,
		});
		expect(await store.deleteFiling(AAPL_10K.accessionNumber)).toEqual({
			chunksDeleted: 0,
			removed: false,
		});
	});

	test("deleteFiling leaves the record when the vector store fails", async () => {
		await store.storeFiling(processed(AAPL_10K, 1));
		vectors.failDeletes = true;

		await expect(store.deleteFiling(AAPL_10K.accessionNumber)).rejects.toThrow(
			"vector store offline",
		);
		expect(await store.registry.isDuplicate(AAPL_10K.accessionNumber)).toBe(true);
	});

	test("deleteByFilter sums chunks and reports affected tickers", async () => {
		await store.storeFiling(processed(AAPL_10K, 2));
		await store.storeFiling(processed(AAPL_10Q, 3));
		await store.storeFiling(processed(MSFT_10K, 5));

		expect(await store.deleteByFilter({ formType: "10-k" })).toEqual({
			filingsDeleted: 2,
			chunksDeleted: 7,
			tickersAffected: ["AAPL", "MSFT"],
		});
		expect(await store.registry.count()).toBe(1);
	});

	test("clearAll empties both stores", async () => {
		await store.storeFiling(processed(AAPL_10K, 2));
		await store.storeFiling(processed(MSFT_10K, 5));

		expect(await store.clearAll()).toEqual({ filingsDeleted: 2, chunksDeleted: 7 });
		expect(await vectors.count()).toBe(0);
		expect(await store.registry.count()).toBe(0);
	});

	test("status aggregates per form and per ticker", async () => {
		await store.storeFiling(processed(MSFT_10K, 5));
		await store.storeFiling(processed(AAPL_10Q, 3));
		await store.storeFiling(processed(AAPL_10K, 2));

		expect(await store.status()).toEqual({
			filingCount: 3,
			maxFilings: 20,
			chunkCount: 10,
			tickers: ["AAPL", "MSFT"],
			formBreakdown: { "10-K": 2, "10-Q": 1 },
			tickerBreakdown: [
				{ ticker: "AAPL", filings: 2, chunks: 5, forms: ["10-K", "10-Q"] },
				{ ticker: "MSFT", filings: 1, chunks: 5, forms: ["10-K"] },
			],
		});
	});
});
