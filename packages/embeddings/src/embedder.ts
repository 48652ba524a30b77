/**
 * Embedder
 *
 * Turns chunks and queries into vectors. The underlying model is held in an
 * explicit Unloaded/Loaded state: it is loaded on first use (or by load()),
 * and optionally unloaded again after a period without encoding calls.
 */

import type { EmbeddingSettings } from "@secsearch/config";
import { type Chunk, EmbeddingError, errorMessage } from "@secsearch/domain";
import { GeminiModelLoader } from "./gemini.js";
import { log } from "./logger.js";
import type { EmbeddingKind, EmbeddingModel, EmbeddingModelLoader } from "./types.js";

// ============================================
// Types
// ============================================

export interface EmbedderOptions {
	/** Texts per encode call. Default: 32 */
	batchSize?: number;
	/** Unload after this many idle minutes; 0 disables. Default: 0 */
	idleTimeoutMinutes?: number;
}

type EmbedderState =
	| { status: "unloaded" }
	| { status: "loaded"; model: EmbeddingModel };

// ============================================
// Embedder Class
// ============================================

/**
 * @example
 * ```typescript
 * const embedder = new Embedder(new GeminiModelLoader(config), { batchSize: 32 });
 * const vectors = await embedder.embedChunks(chunks);
 * const queryVector = await embedder.embedQuery("revenue recognition");
 * ```
 */
export class Embedder {
	private state: EmbedderState = { status: "unloaded" };
	private pendingLoad: Promise<EmbeddingModel> | null = null;
	private idleTimer: ReturnType<typeof setTimeout> | null = null;
	/** Encode calls currently running; the idle clock only runs at zero */
	private inFlight = 0;
	private readonly batchSize: number;
	private readonly idleTimeoutMs: number;

	constructor(
		private readonly loader: EmbeddingModelLoader,
		options: EmbedderOptions = {},
	) {
		this.batchSize = options.batchSize ?? 32;
		this.idleTimeoutMs = (options.idleTimeoutMinutes ?? 0) * 60_000;
	}

	// ============================================
	// Introspection
	// ============================================

	get isLoaded(): boolean {
		return this.state.status === "loaded";
	}

	get modelName(): string {
		return this.state.status === "loaded" ? this.state.model.name : this.loader.modelName;
	}

	/** null while unloaded */
	get device(): string | null {
		return this.state.status === "loaded" ? this.state.model.device : null;
	}

	get approximateVramMb(): number | null {
		return this.state.status === "loaded" ? this.state.model.approximateVramMb : null;
	}

	// ============================================
	// Lifecycle
	// ============================================

	async load(): Promise<void> {
		await this.ensureLoaded();
	}

	/**
	 * Release the model. Safe to call when already unloaded.
	 */
	unload(): void {
		this.clearIdleTimer();
		if (this.state.status === "unloaded") {
			return;
		}
		const { model } = this.state;
		this.state = { status: "unloaded" };
		model.dispose?.();
		log.info({ model: model.name }, "Embedding model unloaded");
	}

	// ============================================
	// Encoding
	// ============================================

	async embedTexts(texts: readonly string[]): Promise<number[][]> {
		if (texts.length === 0) {
			throw new EmbeddingError("No texts to embed");
		}
		return this.encode(texts, "document");
	}

	async embedChunks(chunks: readonly Chunk[]): Promise<number[][]> {
		return this.embedTexts(chunks.map((chunk) => chunk.content));
	}

	async embedQuery(query: string): Promise<number[]> {
		const text = query.trim();
		if (!text) {
			throw new EmbeddingError("Empty query", { details: "Provide a non-empty search query." });
		}
		const [vector] = await this.encode([text], "query");
		if (!vector) {
			throw new EmbeddingError("Failed to generate embeddings", {
				details: "The model returned no vector for the query.",
			});
		}
		return vector;
	}

	// ============================================
	// Internals
	// ============================================

	private async encode(texts: readonly string[], kind: EmbeddingKind): Promise<number[][]> {
		this.inFlight++;
		this.clearIdleTimer();
		try {
			const model = await this.ensureLoaded();
			return await this.encodeBatches(model, texts, kind);
		} finally {
			this.inFlight--;
			this.scheduleIdleUnload();
		}
	}

	private async encodeBatches(
		model: EmbeddingModel,
		texts: readonly string[],
		kind: EmbeddingKind,
	): Promise<number[][]> {
		try {
			const vectors: number[][] = [];
			for (let i = 0; i < texts.length; i += this.batchSize) {
				vectors.push(...(await model.encode(texts.slice(i, i + this.batchSize), kind)));
			}
			log.debug({ count: vectors.length, kind }, "Generated embeddings");
			return vectors;
		} catch (error) {
			throw new EmbeddingError("Failed to generate embeddings", {
				details: errorMessage(error),
				cause: error,
			});
		}
	}

	private async ensureLoaded(): Promise<EmbeddingModel> {
		if (this.state.status === "loaded") {
			return this.state.model;
		}
		if (!this.pendingLoad) {
			this.pendingLoad = this.loadModel().finally(() => {
				this.pendingLoad = null;
			});
		}
		return this.pendingLoad;
	}

	private async loadModel(): Promise<EmbeddingModel> {
		const startTime = Date.now();
		let model: EmbeddingModel;
		try {
			model = await this.loader.load();
		} catch (error) {
			throw new EmbeddingError("Failed to load embedding model", {
				details: errorMessage(error),
				cause: error,
			});
		}

		this.state = { status: "loaded", model };
		log.info(
			{ model: model.name, device: model.device, loadMs: Date.now() - startTime },
			"Embedding model loaded",
		);
		this.scheduleIdleUnload();
		return model;
	}

	private scheduleIdleUnload(): void {
		if (this.idleTimeoutMs <= 0 || this.state.status !== "loaded" || this.inFlight > 0) {
			return;
		}
		this.clearIdleTimer();
		this.idleTimer = setTimeout(() => {
			this.idleTimer = null;
			if (this.inFlight > 0) {
				return;
			}
			log.info({ idleMinutes: this.idleTimeoutMs / 60_000 }, "Unloading idle embedding model");
			this.unload();
		}, this.idleTimeoutMs);
		this.idleTimer.unref();
	}

	private clearIdleTimer(): void {
		if (this.idleTimer) {
			clearTimeout(this.idleTimer);
			this.idleTimer = null;
		}
	}
}

// ============================================
// Factory
// ============================================

/**
 * Embedder backed by Gemini, configured from settings.
 */
export function createEmbedder(settings: EmbeddingSettings): Embedder {
	const loader = new GeminiModelLoader({
		model: settings.modelName,
		dimensions: settings.dimensions,
		batchSize: 100,
		apiKey: settings.apiKey,
	});
	return new Embedder(loader, {
		batchSize: settings.batchSize,
		idleTimeoutMinutes: settings.idleTimeoutMinutes,
	});
}
