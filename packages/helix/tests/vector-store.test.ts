/**
 * HelixDB Vector Store Tests
 *
 * Runs the store against the in-memory MockHelixDB.
 */

import {
	type Chunk,
	createFilingIdentifier,
	DatabaseError,
	type FilingIdentifier,
	type ProcessedFiling,
} from "@secsearch/domain";
import { MockHelixDB } from "@secsearch/mocks";
import { describe, expect, it } from "vitest";
import { createHelixClient } from "../src/client.js";
import { HelixVectorStore } from "../src/vector-store.js";

const ACME_10K = createFilingIdentifier({
	ticker: "ACME",
	formType: "10-K",
	filingDate: "2024-02-20",
	accessionNumber: "0001000001-24-000010",
});
const BOLT_10Q = createFilingIdentifier({
	ticker: "BOLT",
	formType: "10-Q",
	filingDate: "2024-07-30",
	accessionNumber: "0002000002-24-000027",
});

function processed(filingId: FilingIdentifier, vectors: number[][]): ProcessedFiling {
	const chunks: Chunk[] = vectors.map((_, chunkIndex) => ({
		content: `${filingId.ticker} chunk ${chunkIndex}`,
		path: chunkIndex === 0 ? "PART I > Item 1. Business" : "",
		contentType: chunkIndex === 2 ? "table" : "text",
		filingId,
		chunkIndex,
	}));
	return {
		filingId,
		segments: [],
		chunks,
		embeddings: vectors,
		ingestResult: {
			filingId,
			segmentCount: chunks.length,
			chunkCount: chunks.length,
			durationSeconds: 0,
		},
	};
}

function setup(db = new MockHelixDB()) {
	const store = new HelixVectorStore(createHelixClient({ retryDelay: 1, maxRetries: 1 }, db));
	return { db, store };
}

describe("HelixVectorStore", () => {
	it("stores one vector per chunk with its metadata", async () => {
		const { store } = setup();

		await store.storeFiling(processed(ACME_10K, [[1, 0], [0, 1], [1, 1]]));

		expect(await store.count()).toBe(3);
		const [top] = await store.query({ embedding: [1, 0], nResults: 1 });
		expect(top).toEqual({
			content: "ACME chunk 0",
			path: "PART I > Item 1. Business",
			contentType: "text",
			ticker: "ACME",
			formType: "10-K",
			similarity: 1,
			filingDate: "2024-02-20",
			accessionNumber: "0001000001-24-000010",
			chunkId: "ACME_10-K_2024-02-20_000",
		});
	});

	it("ranks by similarity and reports missing paths as unknown", async () => {
		const { store } = setup();
		await store.storeFiling(processed(ACME_10K, [[1, 0], [0, 1], [1, 1]]));

		const results = await store.query({ embedding: [0, 1], nResults: 3 });

		expect(results.map((r) => r.chunkId)).toEqual([
			"ACME_10-K_2024-02-20_001",
			"ACME_10-K_2024-02-20_002",
			"ACME_10-K_2024-02-20_000",
		]);
		expect(results[0]?.path).toBe("(unknown)");
		expect(results[1]?.contentType).toBe("table");
	});

	it("filters across the whole index before truncating", async () => {
		const { store } = setup();
		await store.storeFiling(processed(ACME_10K, [[1, 0], [0.9, 0.1]]));
		await store.storeFiling(processed(BOLT_10Q, [[0, 1]]));

		const results = await store.query({ embedding: [1, 0], nResults: 1, ticker: "bolt" });

		expect(results.map((r) => r.chunkId)).toEqual(["BOLT_10-Q_2024-07-30_000"]);
		expect(
			await store.query({ embedding: [1, 0], nResults: 5, ticker: "ACME", formType: "10-Q" }),
		).toEqual([]);
		expect(
			await store.query({
				embedding: [1, 0],
				nResults: 5,
				accessionNumber: ACME_10K.accessionNumber,
			}),
		).toHaveLength(2);
	});

	it("returns nothing from an empty index", async () => {
		const { store } = setup();
		expect(await store.query({ embedding: [1, 0], nResults: 5, ticker: "ACME" })).toEqual([]);
	});

	it("deletes a filing's chunks and reports how many", async () => {
		const { store } = setup();
		await store.storeFiling(processed(ACME_10K, [[1, 0], [0, 1]]));
		await store.storeFiling(processed(BOLT_10Q, [[0, 1]]));

		expect(await store.deleteFiling(ACME_10K.accessionNumber)).toBe(2);
		expect(await store.deleteFiling(ACME_10K.accessionNumber)).toBe(0);
		expect(await store.count()).toBe(1);
	});

	it("removes partially stored chunks when an insert fails", async () => {
		const { db, store } = setup(new MockHelixDB({ failInsertAt: 2 }));

		const error = await store
			.storeFiling(processed(ACME_10K, [[1, 0], [0, 1], [1, 1]]))
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(DatabaseError);
		expect(error).toMatchObject({ message: "Failed to store filing chunks" });
		expect(db.size).toBe(0);
	});

	it("surfaces HelixDB failures as DatabaseError", async () => {
		const { store } = setup(new MockHelixDB({ failQueries: ["CountFilingChunks"] }));

		await expect(store.count()).rejects.toBeInstanceOf(DatabaseError);
		await expect(store.query({ embedding: [1], nResults: 1, ticker: "ACME" })).rejects.toThrow(
			"Failed to count filing chunks",
		);
	});
});
