/**
 * Pipeline Orchestrator
 *
 * Runs parse -> chunk -> embed for one filing, reporting each step and
 * stopping early when the caller's AbortSignal fires. Writing to the
 * stores is left to the caller.
 */

import {
	type Chunk,
	ConfigurationError,
	EmbeddingError,
	type FilingIdentifier,
	type ProcessedFiling,
} from "@secsearch/domain";
import type { Chunker } from "./chunker.js";
import type { FilingFetcher } from "./fetcher.js";
import { log } from "./logger.js";
import type { FilingParser } from "./parsers/filing-parser.js";
import type { FetchOneOptions } from "./types.js";

// ============================================
// Types
// ============================================

/** Steps reported while processing one filing */
export const PIPELINE_STEPS = ["Parsing", "Chunking", "Embedding", "Complete"] as const;
export const PIPELINE_TOTAL_STEPS = PIPELINE_STEPS.length;

export type ProgressCallback = (step: string, index: number, total: number) => void;

/**
 * Anything that turns chunks into vectors, one per chunk.
 */
export interface ChunkEmbedder {
	embedChunks(chunks: readonly Chunk[]): Promise<number[][]>;
}

export interface ProcessOptions {
	onProgress?: ProgressCallback;
	/** Checked after every progress report */
	signal?: AbortSignal;
}

export type ProcessOutcome =
	| { status: "processed"; filing: ProcessedFiling }
	| { status: "cancelled" };

export interface OrchestratorDeps {
	parser: FilingParser;
	chunker: Chunker;
	embedder: ChunkEmbedder;
	/** Needed only by ingestLatest/ingestOne */
	fetcher?: FilingFetcher;
}

// ============================================
// Orchestrator Class
// ============================================

export class PipelineOrchestrator {
	constructor(private readonly deps: OrchestratorDeps) {}

	/**
	 * Parse, chunk and embed one filing.
	 *
	 * Pipeline errors (ParseError, ChunkingError, EmbeddingError) propagate
	 * unchanged. Cancellation is returned, never thrown.
	 */
	async processFiling(
		filingId: FilingIdentifier,
		html: string,
		options: ProcessOptions = {},
	): Promise<ProcessOutcome> {
		const { onProgress, signal } = options;
		const startTime = Date.now();

		const report = (index: number): boolean => {
			const step = PIPELINE_STEPS[index - 1] ?? "Complete";
			onProgress?.(step, index, PIPELINE_TOTAL_STEPS);
			return signal?.aborted ?? false;
		};

		if (report(1)) {
			return { status: "cancelled" };
		}
		const segments = this.deps.parser.parse(html, filingId);

		if (report(2)) {
			return { status: "cancelled" };
		}
		const chunks = this.deps.chunker.chunk(segments);

		if (report(3)) {
			return { status: "cancelled" };
		}
		const embeddings = await this.deps.embedder.embedChunks(chunks);
		if (embeddings.length !== chunks.length) {
			throw new EmbeddingError("Embedding count mismatch", {
				details: `Expected ${chunks.length} vectors, received ${embeddings.length}.`,
			});
		}

		const durationSeconds = (Date.now() - startTime) / 1000;

		if (report(4)) {
			return { status: "cancelled" };
		}

		log.info(
			{
				ticker: filingId.ticker,
				formType: filingId.formType,
				filingDate: filingId.filingDate,
				segments: segments.length,
				chunks: chunks.length,
				durationSeconds,
			},
			"Processed filing",
		);

		return {
			status: "processed",
			filing: {
				filingId,
				segments,
				chunks,
				embeddings,
				ingestResult: {
					filingId,
					segmentCount: segments.length,
					chunkCount: chunks.length,
					durationSeconds,
				},
			},
		};
	}

	/**
	 * Fetch the most recent filing and process it.
	 */
	async ingestLatest(
		ticker: string,
		formType: string,
		options: ProcessOptions = {},
	): Promise<ProcessOutcome> {
		return this.ingestOne(ticker, formType, { index: 0 }, options);
	}

	/**
	 * Fetch one filing by index (after filters) and process it.
	 */
	async ingestOne(
		ticker: string,
		formType: string,
		selector: FetchOneOptions = {},
		options: ProcessOptions = {},
	): Promise<ProcessOutcome> {
		const fetcher = this.deps.fetcher;
		if (!fetcher) {
			throw new ConfigurationError("Filing fetcher is not configured", {
				details: "Pass a fetcher to the PipelineOrchestrator to ingest by ticker.",
			});
		}

		options.onProgress?.("Fetching", 0, PIPELINE_TOTAL_STEPS);
		if (options.signal?.aborted) {
			return { status: "cancelled" };
		}

		const { filingId, html } = await fetcher.fetchOne(ticker, formType, selector);
		return this.processFiling(filingId, html, options);
	}
}
