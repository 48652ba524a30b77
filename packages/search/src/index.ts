/**
 * @secsearch/search
 *
 * Semantic search over ingested filings.
 */

export { type QueryEmbedder, SearchEngine, type SearchOptions } from "./engine.js";
