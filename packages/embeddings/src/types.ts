/**
 * Embedding Model Types
 */

/** Documents are embedded for storage, queries for retrieval */
export type EmbeddingKind = "document" | "query";

/**
 * A loaded embedding model.
 */
export interface EmbeddingModel {
	readonly name: string;
	/** Where the model runs ("cpu", "cuda:0", "remote") */
	readonly device: string;
	/** Approximate memory held by the model, null when not applicable */
	readonly approximateVramMb: number | null;
	/** One vector per input text, in input order */
	encode(texts: readonly string[], kind: EmbeddingKind): Promise<number[][]>;
	/** Release held resources */
	dispose?(): void;
}

/**
 * Produces a ready model on demand. Loading may be slow.
 */
export interface EmbeddingModelLoader {
	readonly modelName: string;
	load(): Promise<EmbeddingModel>;
}
