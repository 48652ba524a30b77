/**
 * Filing Chunker
 *
 * Splits parsed segments into embedding-sized chunks. Short segments pass
 * through unchanged; long ones are split on sentence boundaries.
 */

import { type Chunk, ChunkingError, type Segment } from "@secsearch/domain";
import { log } from "./logger.js";

// ============================================
// Constants
// ============================================

export const DEFAULT_TOKEN_LIMIT = 500;
export const DEFAULT_TOLERANCE = 50;

/** Split after sentence-ending punctuation followed by whitespace */
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export interface ChunkerOptions {
	/** Target maximum tokens per chunk */
	tokenLimit?: number;
	/** Tokens a chunk may exceed the limit by before a new one is started */
	tolerance?: number;
}

// ============================================
// Utility Functions
// ============================================

/**
 * Approximate token count: whitespace-separated words.
 */
export function countTokens(text: string): number {
	return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function splitSentences(text: string): string[] {
	return text
		.split(SENTENCE_BOUNDARY)
		.map((sentence) => sentence.trim())
		.filter((sentence) => sentence.length > 0);
}

// ============================================
// Chunker Class
// ============================================

/**
 * @example
 * ```typescript
 * const chunker = new Chunker({ tokenLimit: 500, tolerance: 50 });
 * const chunks = chunker.chunk(segments);
 * ```
 */
export class Chunker {
	readonly tokenLimit: number;
	readonly tolerance: number;

	constructor(options: ChunkerOptions = {}) {
		this.tokenLimit = options.tokenLimit ?? DEFAULT_TOKEN_LIMIT;
		this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
	}

	/**
	 * Split one text into chunk contents.
	 */
	splitText(text: string): string[] {
		if (countTokens(text) <= this.tokenLimit) {
			return [text];
		}

		const ceiling = this.tokenLimit + this.tolerance;
		const pieces: string[] = [];
		let current: string[] = [];
		let currentTokens = 0;

		for (const sentence of splitSentences(text)) {
			const sentenceTokens = countTokens(sentence);

			if (currentTokens + sentenceTokens > ceiling && current.length > 0) {
				pieces.push(current.join(" "));
				current = [];
				currentTokens = 0;
			}

			current.push(sentence);
			currentTokens += sentenceTokens;
		}

		if (current.length > 0) {
			pieces.push(current.join(" "));
		}

		return pieces;
	}

	/**
	 * Chunk all segments of one filing. Indices run across the whole filing.
	 *
	 * @throws ChunkingError when there are no segments
	 */
	chunk(segments: readonly Segment[]): Chunk[] {
		const first = segments[0];
		if (!first) {
			throw new ChunkingError("No segments to chunk", { details: "Received empty segments list." });
		}

		const chunks: Chunk[] = [];
		for (const segment of segments) {
			for (const content of this.splitText(segment.content)) {
				chunks.push({
					content,
					path: segment.path,
					contentType: segment.contentType,
					filingId: segment.filingId,
					chunkIndex: chunks.length,
				});
			}
		}

		const tokenCounts = chunks.map((chunk) => countTokens(chunk.content));
		log.info(
			{
				ticker: first.filingId.ticker,
				formType: first.filingId.formType,
				segments: segments.length,
				chunks: chunks.length,
				minTokens: Math.min(...tokenCounts),
				maxTokens: Math.max(...tokenCounts),
				avgTokens: Math.round(tokenCounts.reduce((sum, n) => sum + n, 0) / tokenCounts.length),
				overLimit: tokenCounts.filter((n) => n > this.tokenLimit).length,
			},
			"Created chunks",
		);

		return chunks;
	}
}
