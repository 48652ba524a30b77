/**
 * Search Engine
 *
 * Embeds a query and runs a filtered similarity search over stored chunks.
 */

import type { SearchSettings } from "@secsearch/config";
import { errorMessage, SearchError, type SearchResult } from "@secsearch/domain";
import type { VectorStore } from "@secsearch/storage";
import { log } from "./logger.js";

// ============================================
// Types
// ============================================

/**
 * Anything that turns a query into a vector in the same space as the
 * stored chunks.
 */
export interface QueryEmbedder {
	embedQuery(query: string): Promise<number[]>;
}

export interface SearchOptions {
	/** Defaults to the configured topK */
	topK?: number;
	ticker?: string;
	formType?: string;
	/** Defaults to the configured minimum; 0 disables the threshold */
	minSimilarity?: number;
	accessionNumber?: string;
}

// ============================================
// Search Engine
// ============================================

export class SearchEngine {
	constructor(
		private readonly embedder: QueryEmbedder,
		private readonly vectors: VectorStore,
		private readonly defaults: SearchSettings,
	) {}

	/**
	 * Results ordered by similarity, highest first.
	 *
	 * @throws SearchError for an empty query or any failure along the way
	 */
	async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
		if (!query.trim()) {
			throw new SearchError("Empty search query", {
				details: "Cannot search with an empty or whitespace-only query.",
			});
		}

		const topK = options.topK ?? this.defaults.topK;
		const minSimilarity = options.minSimilarity ?? this.defaults.minSimilarity;

		log.info(
			{
				query: query.slice(0, 80),
				topK,
				minSimilarity,
				ticker: options.ticker ?? "any",
				formType: options.formType ?? "any",
			},
			"Searching",
		);

		let results: SearchResult[];
		try {
			const embedding = await this.embedder.embedQuery(query);
			results = await this.vectors.query({
				embedding,
				nResults: topK,
				ticker: options.ticker,
				formType: options.formType,
				accessionNumber: options.accessionNumber,
			});
		} catch (error) {
			if (error instanceof SearchError) {
				throw error;
			}
			throw new SearchError("Search failed", { details: errorMessage(error), cause: error });
		}

		if (minSimilarity > 0) {
			const before = results.length;
			results = results.filter((result) => result.similarity >= minSimilarity);
			if (results.length < before) {
				log.debug(
					{ filtered: before - results.length, minSimilarity },
					"Dropped low-similarity results",
				);
			}
		}

		log.info({ results: results.length }, "Search complete");
		return results;
	}
}
