/**
 * Gemini Embedding Integration
 *
 * Embedding generation with Google Gemini's embedding models. Supports batch
 * processing, retry logic and a configurable output dimension.
 */

import {
	type EmbedContentParameters,
	type EmbedContentResponse,
	GoogleGenAI,
} from "@google/genai";
import { log } from "./logger.js";
import type { EmbeddingKind, EmbeddingModel, EmbeddingModelLoader } from "./types.js";

// ============================================
// Configuration
// ============================================

export interface GeminiEmbeddingConfig {
	/** Model identifier */
	model: string;
	/** Output dimensions (Matryoshka truncation) */
	dimensions: number;
	/** Max texts per API request */
	batchSize: number;
	apiKey?: string;
}

export const DEFAULT_GEMINI_CONFIG: GeminiEmbeddingConfig = {
	model: "gemini-embedding-001",
	dimensions: 768,
	batchSize: 100,
};

/**
 * Retry configuration
 */
export interface RetryConfig {
	/** Maximum retry attempts */
	maxRetries: number;
	/** Initial delay in ms */
	initialDelayMs: number;
	/** Maximum delay in ms */
	maxDelayMs: number;
	/** Exponential backoff multiplier */
	backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxRetries: 3,
	initialDelayMs: 1000,
	maxDelayMs: 30000,
	backoffMultiplier: 2,
};

/** The single SDK call the client makes */
export interface EmbedContentApi {
	embedContent(params: EmbedContentParameters): Promise<EmbedContentResponse>;
}

const TASK_TYPES: Record<EmbeddingKind, string> = {
	document: "RETRIEVAL_DOCUMENT",
	query: "RETRIEVAL_QUERY",
};

// ============================================
// Helpers
// ============================================

export function isRetryableError(error: Error): boolean {
	const message = error.message.toLowerCase();

	// Rate limit errors
	if (message.includes("rate limit") || message.includes("quota")) {
		return true;
	}

	// Transient errors
	if (
		message.includes("timeout") ||
		message.includes("temporarily") ||
		message.includes("503") ||
		message.includes("429")
	) {
		return true;
	}

	return message.includes("network") || message.includes("econnreset");
}

/**
 * Scale to unit length. Truncated Gemini vectors are not normalized.
 */
export function normalize(values: readonly number[]): number[] {
	const norm = Math.sqrt(values.reduce((sum, value) => sum + value * value, 0));
	return norm === 0 ? [...values] : values.map((value) => value / norm);
}

function chunkArray<T>(array: readonly T[], size: number): T[][] {
	const chunks: T[][] = [];
	for (let i = 0; i < array.length; i += size) {
		chunks.push(array.slice(i, i + size));
	}
	return chunks;
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================
// Embedding Client
// ============================================

/**
 * Gemini embedding model. Runs remotely, so it holds no local memory.
 */
export class GeminiEmbeddingClient implements EmbeddingModel {
	readonly device = "remote";
	readonly approximateVramMb = null;

	constructor(
		private readonly api: EmbedContentApi,
		private readonly config: GeminiEmbeddingConfig = DEFAULT_GEMINI_CONFIG,
		private readonly retryConfig: RetryConfig = DEFAULT_RETRY_CONFIG,
	) {}

	get name(): string {
		return this.config.model;
	}

	async encode(texts: readonly string[], kind: EmbeddingKind): Promise<number[][]> {
		const vectors: number[][] = [];
		for (const batch of chunkArray(texts, this.config.batchSize)) {
			vectors.push(...(await this.embedBatchWithRetry(batch, kind)));
		}
		return vectors;
	}

	private async embedBatchWithRetry(
		texts: string[],
		kind: EmbeddingKind,
	): Promise<number[][]> {
		let lastError: Error | undefined;
		let delay = this.retryConfig.initialDelayMs;

		for (let attempt = 0; attempt <= this.retryConfig.maxRetries; attempt++) {
			try {
				return await this.embedBatch(texts, kind);
			} catch (error) {
				lastError = error instanceof Error ? error : new Error(String(error));

				if (!isRetryableError(lastError)) {
					throw lastError;
				}

				if (attempt < this.retryConfig.maxRetries) {
					log.warn(
						{ attempt: attempt + 1, delayMs: delay, error: lastError.message },
						"Retrying embedding batch",
					);
					await sleep(delay);
					delay = Math.min(delay * this.retryConfig.backoffMultiplier, this.retryConfig.maxDelayMs);
				}
			}
		}

		throw lastError;
	}

	private async embedBatch(texts: string[], kind: EmbeddingKind): Promise<number[][]> {
		const response = await this.api.embedContent({
			model: this.config.model,
			contents: texts,
			config: {
				taskType: TASK_TYPES[kind],
				outputDimensionality: this.config.dimensions,
			},
		});

		const embeddings = response.embeddings ?? [];
		if (embeddings.length !== texts.length) {
			throw new Error(
				`Embedding count mismatch: expected ${texts.length}, got ${embeddings.length}`,
			);
		}

		return embeddings.map((embedding) => {
			const values = embedding.values ?? [];
			if (values.length === 0) {
				throw new Error("Gemini returned an empty embedding");
			}
			return normalize(values);
		});
	}
}

// ============================================
// Loader
// ============================================

/**
 * Creates the Gemini client on load. A missing API key is a load failure.
 */
export class GeminiModelLoader implements EmbeddingModelLoader {
	constructor(
		private readonly config: GeminiEmbeddingConfig,
		private readonly retryConfig: RetryConfig = DEFAULT_RETRY_CONFIG,
	) {}

	get modelName(): string {
		return this.config.model;
	}

	async load(): Promise<EmbeddingModel> {
		const apiKey = this.config.apiKey;
		if (!apiKey) {
			throw new Error("Missing API key: GOOGLE_GENERATIVE_AI_API_KEY environment variable not set");
		}
		const client = new GoogleGenAI({ apiKey });
		return new GeminiEmbeddingClient(client.models, this.config, this.retryConfig);
	}
}
