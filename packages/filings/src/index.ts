/**
 * @secsearch/filings
 *
 * Fetch, parse, chunk and embed SEC filings.
 *
 * @example
 * ```typescript
 * import { Chunker, EdgarClient, FilingFetcher, FilingParser, PipelineOrchestrator } from "@secsearch/filings";
 *
 * const fetcher = new FilingFetcher(new EdgarClient({ userAgent }), { maxFilings: 20 });
 * const orchestrator = new PipelineOrchestrator({ parser: new FilingParser(), chunker: new Chunker(), embedder, fetcher });
 * const outcome = await orchestrator.ingestLatest("AAPL", "10-K");
 * ```
 */

// Chunker
export {
	Chunker,
	type ChunkerOptions,
	countTokens,
	DEFAULT_TOKEN_LIMIT,
	DEFAULT_TOLERANCE,
	splitSentences,
} from "./chunker.js";
// Edgar Client
export {
	EdgarClient,
	type EdgarClientConfig,
	type EdgarToolkit,
	type FetchLike,
} from "./edgar-client.js";
// Fetcher
export {
	describeFilters,
	FilingFetcher,
	type FilingFetcherOptions,
	hasFilters,
	matchesFilters,
} from "./fetcher.js";
export { FilingStream } from "./filing-stream.js";
// Orchestrator
export {
	type ChunkEmbedder,
	type OrchestratorDeps,
	PIPELINE_STEPS,
	PIPELINE_TOTAL_STEPS,
	PipelineOrchestrator,
	type ProcessOptions,
	type ProcessOutcome,
	type ProgressCallback,
} from "./orchestrator.js";
// Parsers
export * from "./parsers/index.js";

// Types
export type {
	EdgarSource,
	FetchedFiling,
	FetchOneOptions,
	FetchOptions,
	FilingFilters,
	FilingListing,
} from "./types.js";
