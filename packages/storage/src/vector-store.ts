/**
 * Vector Store Contract
 *
 * Chunk storage with similarity search. Implemented by the HelixDB store in
 * @secsearch/helix; tests use in-process stand-ins.
 */

import type { ProcessedFiling, SearchResult } from "@secsearch/domain";

export interface VectorQuery {
	embedding: readonly number[];
	nResults: number;
	/** Equality filters, AND-combined */
	ticker?: string;
	formType?: string;
	accessionNumber?: string;
}

export interface VectorStore {
	/** Store every chunk of a filing with its vector and metadata */
	storeFiling(filing: ProcessedFiling): Promise<void>;
	/** @returns chunks deleted, 0 when the filing has none */
	deleteFiling(accessionNumber: string): Promise<number>;
	/** Highest similarity first */
	query(query: VectorQuery): Promise<SearchResult[]>;
	count(): Promise<number>;
}
