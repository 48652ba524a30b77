/**
 * @secsearch/embeddings
 *
 * Embedding generation for filing chunks and search queries.
 */

export { createEmbedder, Embedder, type EmbedderOptions } from "./embedder.js";
export {
	DEFAULT_GEMINI_CONFIG,
	DEFAULT_RETRY_CONFIG,
	type EmbedContentApi,
	GeminiEmbeddingClient,
	type GeminiEmbeddingConfig,
	GeminiModelLoader,
	isRetryableError,
	normalize,
	type RetryConfig,
} from "./gemini.js";
export type { EmbeddingKind, EmbeddingModel, EmbeddingModelLoader } from "./types.js";
