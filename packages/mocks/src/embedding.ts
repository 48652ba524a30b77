/**
 * Mock Embedding Model
 *
 * Bag-of-words hashing into a small vector. Texts sharing words get similar
 * vectors, so search ranking is meaningful in tests.
 */

import type { EmbeddingKind, EmbeddingModel, EmbeddingModelLoader } from "@secsearch/embeddings";

const WORD_PATTERN = /[a-z0-9]+/g;

/** FNV-1a */
function hashWord(word: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < word.length; i++) {
		hash ^= word.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193) >>> 0;
	}
	return hash;
}

export function hashEmbedding(text: string, dimensions: number): number[] {
	const vector = Array.from({ length: dimensions }, () => 0);
	for (const word of text.toLowerCase().match(WORD_PATTERN) ?? []) {
		const index = hashWord(word) % dimensions;
		vector[index] = (vector[index] ?? 0) + 1;
	}
	const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
	return norm === 0 ? vector : vector.map((value) => value / norm);
}

export class MockEmbeddingModel implements EmbeddingModel {
	readonly name = "mock-embedding";
	readonly device = "cpu";
	readonly approximateVramMb = null;
	/** Texts encoded, per call */
	readonly calls: Array<{ texts: string[]; kind: EmbeddingKind }> = [];
	disposed = false;

	constructor(private readonly dimensions = 64) {}

	async encode(texts: readonly string[], kind: EmbeddingKind): Promise<number[][]> {
		this.calls.push({ texts: [...texts], kind });
		return texts.map((text) => hashEmbedding(text, this.dimensions));
	}

	dispose(): void {
		this.disposed = true;
	}
}

export class MockModelLoader implements EmbeddingModelLoader {
	readonly modelName = "mock-embedding";
	loads = 0;
	lastModel: MockEmbeddingModel | null = null;

	constructor(
		private readonly dimensions = 64,
		private readonly failure: Error | null = null,
	) {}

	async load(): Promise<EmbeddingModel> {
		this.loads++;
		if (this.failure) {
			throw this.failure;
		}
		this.lastModel = new MockEmbeddingModel(this.dimensions);
		return this.lastModel;
	}
}
