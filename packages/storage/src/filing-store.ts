/**
 * Filing Store
 *
 * Keeps the vector store and the registry in step. Writes go to the vector
 * store first and are compensated if registration fails; deletes go to the
 * vector store first, then the registry.
 */

import { errorMessage, type FilingRecord, type ProcessedFiling } from "@secsearch/domain";
import { log } from "./logger.js";
import type { FilingFilters, FilingsRepository } from "./repositories/filings.js";
import type { VectorStore } from "./vector-store.js";

// ============================================
// Types
// ============================================

export interface DeleteFilingResult {
	chunksDeleted: number;
	/** false when the filing was not registered */
	removed: boolean;
}

export interface BulkDeleteResult {
	filingsDeleted: number;
	chunksDeleted: number;
	tickersAffected: string[];
}

export interface ClearAllResult {
	filingsDeleted: number;
	chunksDeleted: number;
}

export interface TickerBreakdown {
	ticker: string;
	filings: number;
	chunks: number;
	forms: string[];
}

export interface StoreStatus {
	filingCount: number;
	maxFilings: number;
	chunkCount: number;
	tickers: string[];
	formBreakdown: Record<string, number>;
	tickerBreakdown: TickerBreakdown[];
}

// ============================================
// Filing Store
// ============================================

export class FilingStore {
	constructor(
		readonly vectors: VectorStore,
		readonly registry: FilingsRepository,
	) {}

	/**
	 * Store vectors, then register. A failed registration removes the vectors
	 * just written before the error is rethrown.
	 */
	async storeFiling(filing: ProcessedFiling): Promise<FilingRecord> {
		const { filingId } = filing;
		await this.vectors.storeFiling(filing);

		try {
			return await this.registry.registerFiling(filingId, filing.chunks.length);
		} catch (error) {
			log.warn(
				{ accessionNumber: filingId.accessionNumber, error: errorMessage(error) },
				"Registration failed, removing stored chunks",
			);
			try {
				await this.vectors.deleteFiling(filingId.accessionNumber);
			} catch (rollbackError) {
				log.error(
					{ accessionNumber: filingId.accessionNumber, error: errorMessage(rollbackError) },
					"Failed to remove chunks after registration failure",
				);
			}
			throw error;
		}
	}

	async deleteFiling(accessionNumber: string): Promise<DeleteFilingResult> {
		const chunksDeleted = await this.vectors.deleteFiling(accessionNumber);
		const removed = await this.registry.removeFiling(accessionNumber);
		return { chunksDeleted, removed };
	}

	/**
	 * Delete every filing matching the filters. No filters matches everything.
	 */
	async deleteByFilter(filters: FilingFilters = {}): Promise<BulkDeleteResult> {
		const filings = await this.registry.listFilings(filters);
		let chunksDeleted = 0;
		const tickers = new Set<string>();

		for (const filing of filings) {
			const result = await this.deleteFiling(filing.accessionNumber);
			chunksDeleted += result.chunksDeleted;
			tickers.add(filing.ticker);
		}

		if (filings.length > 0) {
			log.info({ ...filters, filingsDeleted: filings.length, chunksDeleted }, "Bulk delete");
		}

		return {
			filingsDeleted: filings.length,
			chunksDeleted,
			tickersAffected: [...tickers].sort(),
		};
	}

	async clearAll(): Promise<ClearAllResult> {
		const { filingsDeleted, chunksDeleted } = await this.deleteByFilter();
		return { filingsDeleted, chunksDeleted };
	}

	async status(): Promise<StoreStatus> {
		const filings = await this.registry.listFilings();
		const chunkCount = await this.vectors.count();

		const formBreakdown: Record<string, number> = {};
		const byTicker = new Map<string, { filings: number; chunks: number; forms: Set<string> }>();

		for (const filing of filings) {
			formBreakdown[filing.formType] = (formBreakdown[filing.formType] ?? 0) + 1;
			const entry = byTicker.get(filing.ticker) ?? {
				filings: 0,
				chunks: 0,
				forms: new Set<string>(),
			};
			entry.filings += 1;
			entry.chunks += filing.chunkCount;
			entry.forms.add(filing.formType);
			byTicker.set(filing.ticker, entry);
		}

		const tickers = [...byTicker.keys()].sort();

		return {
			filingCount: filings.length,
			maxFilings: this.registry.limit,
			chunkCount,
			tickers,
			formBreakdown: Object.fromEntries(
				Object.entries(formBreakdown).sort(([a], [b]) => a.localeCompare(b)),
			),
			tickerBreakdown: tickers.map((ticker) => {
				const entry = byTicker.get(ticker);
				return {
					ticker,
					filings: entry?.filings ?? 0,
					chunks: entry?.chunks ?? 0,
					forms: [...(entry?.forms ?? [])].sort(),
				};
			}),
		};
	}
}
