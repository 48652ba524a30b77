/**
 * Shared Service Wiring
 *
 * Builds the stores, pipeline, search engine and task manager from
 * settings. The API server and the CLI each create one Services instance
 * per process and pass it down.
 */

import { edgarUserAgent, type Settings } from "@secsearch/config";
import { errorMessage } from "@secsearch/domain";
import { createEmbedder, Embedder, type EmbeddingModelLoader } from "@secsearch/embeddings";
import {
	Chunker,
	EdgarClient,
	type EdgarSource,
	FilingFetcher,
	FilingParser,
	PipelineOrchestrator,
} from "@secsearch/filings";
import {
	createHelixClientFromSettings,
	type HelixClient,
	type HelixTransport,
	HelixVectorStore,
} from "@secsearch/helix";
import { SearchEngine } from "@secsearch/search";
import {
	createLocalClient,
	FilingStore,
	FilingsRepository,
	runMigrations,
	type SqliteClient,
} from "@secsearch/storage";
import { TaskManager } from "@secsearch/tasks";
import { log } from "./logger.js";

// ============================================
// Types
// ============================================

export interface Services {
	settings: Settings;
	store: FilingStore;
	registry: FilingsRepository;
	embedder: Embedder;
	fetcher: FilingFetcher;
	orchestrator: PipelineOrchestrator;
	search: SearchEngine;
	tasks: TaskManager;
	helix: HelixClient;
	/**
	 * Cancel unfinished tasks, wait for the running one to wind down, then
	 * release connections.
	 */
	close(): Promise<void>;
}

/**
 * Replacements for the external systems, used by tests.
 */
export interface ServiceOverrides {
	edgar?: EdgarSource;
	helixTransport?: HelixTransport;
	modelLoader?: EmbeddingModelLoader;
	/** Must not be migrated yet; migrations run on it */
	sqlite?: SqliteClient;
}

// ============================================
// EDGAR
// ============================================

/**
 * EDGAR client built on first use, so commands that never fetch work
 * without an EDGAR identity.
 */
function lazyEdgarSource(settings: Settings): EdgarSource {
	let client: EdgarClient | null = null;
	const get = (): EdgarClient => {
		client ??= new EdgarClient({
			userAgent: edgarUserAgent(settings),
			rateLimitDelay: settings.edgar.rateLimitDelay,
			timeout: settings.edgar.timeoutMs,
		});
		return client;
	};

	return {
		listFilings: (ticker, formType) => get().listFilings(ticker, formType),
		getFilingHtml: (listing) => get().getFilingHtml(listing),
	};
}

// ============================================
// Factory
// ============================================

export async function createServices(
	settings: Settings,
	overrides: ServiceOverrides = {},
): Promise<Services> {
	const sqlite = overrides.sqlite ?? (await createLocalClient(settings.database.metadataDbPath));
	await runMigrations(sqlite);

	const registry = new FilingsRepository(sqlite, settings.database.maxFilings);
	const helix = createHelixClientFromSettings(settings.helix, overrides.helixTransport);
	const store = new FilingStore(new HelixVectorStore(helix), registry);

	const embedder = overrides.modelLoader
		? new Embedder(overrides.modelLoader, {
				batchSize: settings.embedding.batchSize,
				idleTimeoutMinutes: settings.embedding.idleTimeoutMinutes,
			})
		: createEmbedder(settings.embedding);

	const fetcher = new FilingFetcher(overrides.edgar ?? lazyEdgarSource(settings), {
		maxFilings: settings.database.maxFilings,
	});
	const orchestrator = new PipelineOrchestrator({
		parser: new FilingParser(),
		chunker: new Chunker(settings.chunking),
		embedder,
		fetcher,
	});
	const search = new SearchEngine(embedder, store.vectors, settings.search);
	const tasks = new TaskManager({ fetcher, orchestrator, store });

	log.info(
		{
			metadataDb: settings.database.metadataDbPath,
			helix: `${settings.helix.host}:${settings.helix.port}`,
			model: embedder.modelName,
		},
		"Services ready",
	);

	return {
		settings,
		store,
		registry,
		embedder,
		fetcher,
		orchestrator,
		search,
		tasks,
		helix,
		async close() {
			tasks.stop();
			for (const task of tasks.listTasks()) {
				tasks.cancelTask(task.taskId);
			}
			await tasks.waitForIdle();
			embedder.unload();
			helix.close();
			try {
				sqlite.close();
			} catch (error) {
				log.warn({ error: errorMessage(error) }, "Failed to close metadata database");
			}
		},
	};
}
