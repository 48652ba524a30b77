/**
 * Search Engine Tests
 */

import {
	type Chunk,
	createFilingIdentifier,
	type ProcessedFiling,
	SearchError,
	type SearchResult,
} from "@secsearch/domain";
import { Embedder } from "@secsearch/embeddings";
import { createHelixClient, HelixVectorStore } from "@secsearch/helix";
import { hashEmbedding, MockHelixDB, MockModelLoader } from "@secsearch/mocks";
import type { VectorQuery, VectorStore } from "@secsearch/storage";
import { describe, expect, test } from "vitest";
import { type QueryEmbedder, SearchEngine } from "./engine.js";

const DEFAULTS = { topK: 5, minSimilarity: 0 };

function result(chunkId: string, similarity: number): SearchResult {
	return {
		content: `content of ${chunkId}`,
		path: "PART I > Item 1. Business",
		contentType: "text",
		ticker: "ACME",
		formType: "10-K",
		similarity,
		filingDate: "2024-02-20",
		accessionNumber: "0001000001-24-000010",
		chunkId,
	};
}

class FakeEmbedder implements QueryEmbedder {
	readonly queries: string[] = [];
	constructor(private readonly failure: Error | null = null) {}

	async embedQuery(query: string): Promise<number[]> {
		this.queries.push(query);
		if (this.failure) {
			throw this.failure;
		}
		return [1, 0, 0];
	}
}

class FakeVectorStore implements VectorStore {
	readonly queries: VectorQuery[] = [];
	constructor(
		private readonly results: SearchResult[] = [],
		private readonly failure: Error | null = null,
	) {}

	async storeFiling(): Promise<void> {}
	async deleteFiling(): Promise<number> {
		return 0;
	}
	async count(): Promise<number> {
		return this.results.length;
	}
	async query(query: VectorQuery): Promise<SearchResult[]> {
		this.queries.push(query);
		if (this.failure) {
			throw this.failure;
		}
		return this.results;
	}
}

describe("SearchEngine", () => {
	test("rejects an empty query before embedding", async () => {
		const embedder = new FakeEmbedder();
		const engine = new SearchEngine(embedder, new FakeVectorStore(), DEFAULTS);

		await expect(engine.search("   ")).rejects.toThrow(
			expect.objectContaining({ name: "SearchError", message: "Empty search query" }),
		);
		expect(embedder.queries).toEqual([]);
	});

	test("queries with configured defaults and the given filters", async () => {
		const store = new FakeVectorStore([result("a", 0.9)]);
		const engine = new SearchEngine(new FakeEmbedder(), store, DEFAULTS);

		await engine.search("revenue", { ticker: "ACME", formType: "10-K", accessionNumber: "x" });

		expect(store.queries).toEqual([
			{
				embedding: [1, 0, 0],
				nResults: 5,
				ticker: "ACME",
				formType: "10-K",
				accessionNumber: "x",
			},
		]);
	});

	test("an explicit topK overrides the default", async () => {
		const store = new FakeVectorStore();
		const engine = new SearchEngine(new FakeEmbedder(), store, DEFAULTS);

		await engine.search("revenue", { topK: 12 });

		expect(store.queries[0]?.nResults).toBe(12);
	});

	test("drops results below the minimum similarity and keeps store order", async () => {
		const store = new FakeVectorStore([result("a", 0.8), result("b", 0.3), result("c", 0.5)]);
		const engine = new SearchEngine(new FakeEmbedder(), store, DEFAULTS);

		const results = await engine.search("revenue", { minSimilarity: 0.5 });

		expect(results.map((r) => r.chunkId)).toEqual(["a", "c"]);
	});

	test("uses the configured minimum similarity", async () => {
		const store = new FakeVectorStore([result("a", 0.8), result("b", 0.3)]);
		const engine = new SearchEngine(new FakeEmbedder(), store, { topK: 5, minSimilarity: 0.4 });

		const results = await engine.search("revenue");

		expect(results.map((r) => r.chunkId)).toEqual(["a"]);
	});

	test("wraps embedding failures", async () => {
		const engine = new SearchEngine(
			new FakeEmbedder(new Error("model offline")),
			new FakeVectorStore(),
			DEFAULTS,
		);

		await expect(engine.search("revenue")).rejects.toThrow(
			expect.objectContaining({ message: "Search failed", details: "model offline" }),
		);
	});

	test("passes search errors through unchanged", async () => {
		const failure = new SearchError("Index unavailable");
		const engine = new SearchEngine(
			new FakeEmbedder(),
			new FakeVectorStore([], failure),
			DEFAULTS,
		);

		await expect(engine.search("revenue")).rejects.toBe(failure);
	});
});

describe("SearchEngine over HelixDB", () => {
	const filingId = createFilingIdentifier({
		ticker: "ACME",
		formType: "10-K",
		filingDate: "2024-02-20",
		accessionNumber: "0001000001-24-000010",
	});
	const contents = [
		"Revenue grew on strong sensor demand",
		"Supply chain risk from single source suppliers",
		"Cash and marketable securities",
	];

	async function seeded() {
		const db = new MockHelixDB();
		const vectors = new HelixVectorStore(createHelixClient({ retryDelay: 1, maxRetries: 1 }, db));
		const chunks: Chunk[] = contents.map((content, chunkIndex) => ({
			content,
			path: "PART I > Item 1A. Risk Factors",
			contentType: "text",
			filingId,
			chunkIndex,
		}));
		const filing: ProcessedFiling = {
			filingId,
			segments: [],
			chunks,
			embeddings: contents.map((content) => hashEmbedding(content, 64)),
			ingestResult: { filingId, segmentCount: 3, chunkCount: 3, durationSeconds: 0.1 },
		};
		await vectors.storeFiling(filing);
		return new SearchEngine(new Embedder(new MockModelLoader(64)), vectors, DEFAULTS);
	}

	test("ranks the chunk sharing the query's words first", async () => {
		const engine = await seeded();

		const results = await engine.search("supply chain risk", { topK: 2 });

		expect(results).toHaveLength(2);
		expect(results[0]).toMatchObject({
			chunkId: "ACME_10-K_2024-02-20_001",
			content: "Supply chain risk from single source suppliers",
			ticker: "ACME",
			formType: "10-K",
		});
		expect(results[0]?.similarity).toBeGreaterThan(results[1]?.similarity ?? 1);
	});

	test("returns nothing for a ticker that was never ingested", async () => {
		const engine = await seeded();

		expect(await engine.search("supply chain risk", { ticker: "BOLT" })).toEqual([]);
	});
});
