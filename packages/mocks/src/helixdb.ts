/**
 * Mock HelixDB
 *
 * In-memory stand-in for a HelixDB instance running the FilingChunk queries
 * in db/helix/queries.hx. Search ranks by cosine distance like the real
 * HNSW index, without the approximation.
 */

import { z } from "zod";

// ============================================
// Types
// ============================================

export interface StoredVector {
	vector: number[];
	properties: Record<string, unknown>;
}

export interface MockHelixDBConfig {
	/** Simulated query delay (ms) */
	queryDelay?: number;
	/** Fail every query */
	simulateFailure?: boolean;
	/** Fail only these query names */
	failQueries?: string[];
	/** Fail the nth InsertFilingChunk call (1-based) */
	failInsertAt?: number;
}

const InsertParamsSchema = z.looseObject({
	vector: z.array(z.number()),
	accession_number: z.string(),
});
const AccessionParamsSchema = z.object({ accession_number: z.string() });
const SearchParamsSchema = z.object({
	vector: z.array(z.number()),
	limit: z.number().int().min(0),
});

// ============================================
// Mock HelixDB
// ============================================

export class MockHelixDB {
	private vectors: StoredVector[] = [];
	private inserts = 0;
	private readonly config: Required<MockHelixDBConfig>;
	/** Names of every query received, in order */
	readonly calls: string[] = [];

	constructor(config: MockHelixDBConfig = {}) {
		this.config = {
			queryDelay: config.queryDelay ?? 0,
			simulateFailure: config.simulateFailure ?? false,
			failQueries: config.failQueries ?? [],
			failInsertAt: config.failInsertAt ?? 0,
		};
	}

	/**
	 * Execute a compiled query by name.
	 */
	async query(queryName: string, params: Record<string, unknown>): Promise<unknown> {
		this.calls.push(queryName);
		await this.simulateDelay();
		if (this.config.simulateFailure || this.config.failQueries.includes(queryName)) {
			throw new Error(`Mock HelixDB failure: ${queryName}`);
		}

		switch (queryName) {
			case "InsertFilingChunk":
				return this.insert(params);
			case "GetFilingChunkIds":
				return {
					chunks: this.byAccession(params).map((stored) => ({
						chunk_id: stored.properties.chunk_id,
					})),
				};
			case "DeleteFilingChunks": {
				const { accession_number } = AccessionParamsSchema.parse(params);
				this.vectors = this.vectors.filter(
					(stored) => stored.properties.accession_number !== accession_number,
				);
				return "deleted";
			}
			case "SearchFilingChunks":
				return this.search(params);
			case "CountFilingChunks":
				return { total: this.vectors.length };
			default:
				throw new Error(`Unknown query: ${queryName}`);
		}
	}

	// ============================================
	// Query Implementations
	// ============================================

	private insert(params: Record<string, unknown>): unknown {
		this.inserts++;
		if (this.config.failInsertAt === this.inserts) {
			throw new Error("Mock HelixDB failure: InsertFilingChunk");
		}
		const { vector, ...properties } = InsertParamsSchema.parse(params);
		const stored = { vector, properties };
		this.vectors.push(stored);
		return { chunk: { ...properties } };
	}

	private byAccession(params: Record<string, unknown>): StoredVector[] {
		const { accession_number } = AccessionParamsSchema.parse(params);
		return this.vectors.filter((stored) => stored.properties.accession_number === accession_number);
	}

	private search(params: Record<string, unknown>): unknown {
		const { vector, limit } = SearchParamsSchema.parse(params);
		const chunks = this.vectors
			.map((stored) => ({
				...stored.properties,
				distance: 1 - cosineSimilarity(vector, stored.vector),
			}))
			.sort((a, b) => a.distance - b.distance)
			.slice(0, limit);
		return { chunks };
	}

	// ============================================
	// Utility Methods
	// ============================================

	/** Stored vectors, for assertions */
	get size(): number {
		return this.vectors.length;
	}

	clear(): void {
		this.vectors = [];
		this.inserts = 0;
		this.calls.length = 0;
	}

	private async simulateDelay(): Promise<void> {
		if (this.config.queryDelay > 0) {
			await new Promise((resolve) => setTimeout(resolve, this.config.queryDelay));
		}
	}
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		return 0;
	}

	let dotProduct = 0;
	let normA = 0;
	let normB = 0;

	a.forEach((value, i) => {
		const other = b[i] ?? 0;
		dotProduct += value * other;
		normA += value * value;
		normB += other * other;
	});

	if (normA === 0 || normB === 0) {
		return 0;
	}
	return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function createMockHelixDB(config?: MockHelixDBConfig): MockHelixDB {
	return new MockHelixDB(config);
}
