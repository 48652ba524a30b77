/**
 * HelixDB Vector Store
 *
 * Stores filing chunks as FilingChunk vectors (db/helix/schema.hx) and
 * searches them by cosine distance.
 */

import {
	chunkMetadata,
	ContentTypeSchema,
	createChunkId,
	DatabaseError,
	errorMessage,
	FormTypeSchema,
	type ProcessedFiling,
	type SearchResult,
	UNKNOWN_PATH,
} from "@secsearch/domain";
import { createServiceLogger } from "@secsearch/logger";
import type { VectorQuery, VectorStore } from "@secsearch/storage";
import { z } from "zod";
import type { HelixClient } from "./client.js";

const log = createServiceLogger("helix");

// ============================================
// Query Names
// ============================================

export const HELIX_QUERIES = {
	insertChunk: "InsertFilingChunk",
	getChunkIds: "GetFilingChunkIds",
	deleteChunks: "DeleteFilingChunks",
	search: "SearchFilingChunks",
	count: "CountFilingChunks",
} as const;

// ============================================
// Response Schemas
// ============================================

const StoredChunkSchema = z.object({
	chunk_id: z.string(),
	content: z.string(),
	path: z.string().optional(),
	content_type: ContentTypeSchema.catch("text"),
	ticker: z.string(),
	form_type: FormTypeSchema,
	filing_date: z.string(),
	accession_number: z.string(),
	distance: z.number(),
});

const SearchResponseSchema = z.object({ chunks: z.array(StoredChunkSchema) });
const ChunkIdsResponseSchema = z.object({ chunks: z.array(z.object({ chunk_id: z.string() })) });
const CountResponseSchema = z.object({ total: z.number().int().min(0) });

type StoredChunk = z.infer<typeof StoredChunkSchema>;

function toSearchResult(chunk: StoredChunk): SearchResult {
	return {
		content: chunk.content,
		path: chunk.path ? chunk.path : UNKNOWN_PATH,
		contentType: chunk.content_type,
		ticker: chunk.ticker,
		formType: chunk.form_type,
		similarity: 1 - chunk.distance,
		filingDate: chunk.filing_date,
		accessionNumber: chunk.accession_number,
		chunkId: chunk.chunk_id,
	};
}

function matchesFilter(chunk: StoredChunk, query: VectorQuery): boolean {
	return (
		(query.ticker === undefined || chunk.ticker === query.ticker.toUpperCase()) &&
		(query.formType === undefined || chunk.form_type === query.formType.toUpperCase()) &&
		(query.accessionNumber === undefined || chunk.accession_number === query.accessionNumber)
	);
}

// ============================================
// Vector Store
// ============================================

export class HelixVectorStore implements VectorStore {
	constructor(private readonly client: HelixClient) {}

	/**
	 * Insert every chunk. When an insert fails, chunks already written for
	 * the filing are deleted before the error is raised.
	 */
	async storeFiling(filing: ProcessedFiling): Promise<void> {
		const { filingId, chunks, embeddings } = filing;
		if (embeddings.length !== chunks.length) {
			throw new DatabaseError("Failed to store filing chunks", {
				details: `${chunks.length} chunks but ${embeddings.length} embeddings.`,
			});
		}

		try {
			for (const [index, chunk] of chunks.entries()) {
				const metadata = chunkMetadata(chunk);
				await this.client.query(HELIX_QUERIES.insertChunk, {
					vector: embeddings[index],
					chunk_id: createChunkId(filingId, chunk.chunkIndex),
					content: chunk.content,
					path: metadata.path,
					content_type: metadata.contentType,
					ticker: metadata.ticker,
					form_type: metadata.formType,
					filing_date: metadata.filingDate,
					accession_number: metadata.accessionNumber,
					chunk_index: chunk.chunkIndex,
				});
			}
		} catch (error) {
			await this.discardPartialFiling(filingId.accessionNumber);
			throw new DatabaseError("Failed to store filing chunks", {
				details: errorMessage(error),
				cause: error,
			});
		}

		log.info(
			{ accessionNumber: filingId.accessionNumber, chunks: chunks.length },
			"Stored filing chunks",
		);
	}

	async deleteFiling(accessionNumber: string): Promise<number> {
		try {
			const ids = await this.chunkIds(accessionNumber);
			if (ids.length === 0) {
				return 0;
			}
			await this.client.query(HELIX_QUERIES.deleteChunks, { accession_number: accessionNumber });
			log.info({ accessionNumber, chunks: ids.length }, "Deleted filing chunks");
			return ids.length;
		} catch (error) {
			throw new DatabaseError("Failed to delete filing chunks", {
				details: errorMessage(error),
				cause: error,
			});
		}
	}

	/**
	 * Filtered queries search the whole index, then filter, then truncate.
	 */
	async query(query: VectorQuery): Promise<SearchResult[]> {
		const filtered =
			query.ticker !== undefined ||
			query.formType !== undefined ||
			query.accessionNumber !== undefined;

		try {
			const limit = filtered ? await this.count() : query.nResults;
			if (limit === 0) {
				return [];
			}

			const { data } = await this.client.query(HELIX_QUERIES.search, {
				vector: query.embedding,
				limit,
			});
			const { chunks } = SearchResponseSchema.parse(data);

			return chunks
				.filter((chunk) => matchesFilter(chunk, query))
				.map(toSearchResult)
				.sort((a, b) => b.similarity - a.similarity)
				.slice(0, query.nResults);
		} catch (error) {
			if (error instanceof DatabaseError) {
				throw error;
			}
			throw new DatabaseError("Vector search failed", {
				details: errorMessage(error),
				cause: error,
			});
		}
	}

	async count(): Promise<number> {
		try {
			const { data } = await this.client.query(HELIX_QUERIES.count);
			return CountResponseSchema.parse(data).total;
		} catch (error) {
			throw new DatabaseError("Failed to count filing chunks", {
				details: errorMessage(error),
				cause: error,
			});
		}
	}

	private async chunkIds(accessionNumber: string): Promise<string[]> {
		const { data } = await this.client.query(HELIX_QUERIES.getChunkIds, {
			accession_number: accessionNumber,
		});
		return ChunkIdsResponseSchema.parse(data).chunks.map((chunk) => chunk.chunk_id);
	}

	private async discardPartialFiling(accessionNumber: string): Promise<void> {
		try {
			await this.client.query(HELIX_QUERIES.deleteChunks, { accession_number: accessionNumber });
		} catch (error) {
			log.error(
				{ accessionNumber, error: errorMessage(error) },
				"Failed to remove partially stored chunks",
			);
		}
	}
}
