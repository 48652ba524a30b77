/**
 * Settings Schema
 *
 * Runtime configuration for every package. Values arrive from three layers
 * (defaults, YAML file, environment) and are validated once here.
 */

import { z } from "zod";

// ============================================
// Section Schemas
// ============================================

const positiveInt = z.coerce.number().int().positive();

export const EdgarSettingsSchema = z.object({
	/** Name sent in the SEC User-Agent header */
	identityName: z.string(),
	/** Contact email sent in the SEC User-Agent header */
	identityEmail: z.string(),
	/** Seconds between EDGAR requests */
	rateLimitDelay: z.coerce.number().min(0),
	timeoutMs: positiveInt,
});

export const EmbeddingSettingsSchema = z.object({
	modelName: z.string().min(1),
	dimensions: positiveInt,
	batchSize: positiveInt,
	/** Unload the model after this many idle minutes; 0 disables */
	idleTimeoutMinutes: z.coerce.number().min(0),
	apiKey: z.string().optional(),
});

export const ChunkingSettingsSchema = z.object({
	tokenLimit: positiveInt,
	tolerance: z.coerce.number().int().min(0),
});

export const DatabaseSettingsSchema = z.object({
	metadataDbPath: z.string().min(1),
	maxFilings: positiveInt,
});

export const HelixSettingsSchema = z.object({
	host: z.string().min(1),
	port: positiveInt.max(65535),
	timeoutMs: positiveInt,
	maxRetries: z.coerce.number().int().min(0),
});

export const SearchSettingsSchema = z.object({
	topK: positiveInt.max(100),
	minSimilarity: z.coerce.number().min(0).max(1),
});

export const ApiSettingsSchema = z.object({
	host: z.string().min(1),
	port: positiveInt.max(65535),
	corsOrigins: z.array(z.string()),
});

export const SettingsSchema = z.object({
	edgar: EdgarSettingsSchema,
	embedding: EmbeddingSettingsSchema,
	chunking: ChunkingSettingsSchema,
	database: DatabaseSettingsSchema,
	helix: HelixSettingsSchema,
	search: SearchSettingsSchema,
	api: ApiSettingsSchema,
});

export type Settings = z.infer<typeof SettingsSchema>;
export type EdgarSettings = z.infer<typeof EdgarSettingsSchema>;
export type EmbeddingSettings = z.infer<typeof EmbeddingSettingsSchema>;
export type ChunkingSettings = z.infer<typeof ChunkingSettingsSchema>;
export type DatabaseSettings = z.infer<typeof DatabaseSettingsSchema>;
export type HelixSettings = z.infer<typeof HelixSettingsSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
export type ApiSettings = z.infer<typeof ApiSettingsSchema>;

// ============================================
// Defaults
// ============================================

export const DEFAULT_SETTINGS: Settings = {
	edgar: {
		identityName: "",
		identityEmail: "",
		rateLimitDelay: 0.1,
		timeoutMs: 30_000,
	},
	embedding: {
		modelName: "gemini-embedding-001",
		dimensions: 768,
		batchSize: 32,
		idleTimeoutMinutes: 0,
	},
	chunking: {
		tokenLimit: 500,
		tolerance: 50,
	},
	database: {
		metadataDbPath: "./data/metadata.sqlite",
		maxFilings: 20,
	},
	helix: {
		host: "localhost",
		port: 6969,
		timeoutMs: 5000,
		maxRetries: 3,
	},
	search: {
		topK: 5,
		minSimilarity: 0,
	},
	api: {
		host: "127.0.0.1",
		port: 8000,
		corsOrigins: ["http://localhost:3000"],
	},
};

// ============================================
// Environment Bindings
// ============================================

type SectionKey = keyof Settings;

interface EnvBinding {
	section: SectionKey;
	key: string;
	/** Comma-separated list value */
	list?: boolean;
}

/**
 * Environment variables and the setting each one overrides.
 */
export const ENV_BINDINGS: Readonly<Record<string, EnvBinding>> = {
	EDGAR_IDENTITY_NAME: { section: "edgar", key: "identityName" },
	EDGAR_IDENTITY_EMAIL: { section: "edgar", key: "identityEmail" },
	EDGAR_RATE_LIMIT_DELAY: { section: "edgar", key: "rateLimitDelay" },
	EDGAR_TIMEOUT: { section: "edgar", key: "timeoutMs" },
	EMBEDDING_MODEL_NAME: { section: "embedding", key: "modelName" },
	EMBEDDING_DIMENSIONS: { section: "embedding", key: "dimensions" },
	EMBEDDING_BATCH_SIZE: { section: "embedding", key: "batchSize" },
	EMBEDDING_IDLE_TIMEOUT_MINUTES: { section: "embedding", key: "idleTimeoutMinutes" },
	GOOGLE_GENERATIVE_AI_API_KEY: { section: "embedding", key: "apiKey" },
	CHUNKING_TOKEN_LIMIT: { section: "chunking", key: "tokenLimit" },
	CHUNKING_TOLERANCE: { section: "chunking", key: "tolerance" },
	DB_METADATA_DB_PATH: { section: "database", key: "metadataDbPath" },
	DB_MAX_FILINGS: { section: "database", key: "maxFilings" },
	HELIX_HOST: { section: "helix", key: "host" },
	HELIX_PORT: { section: "helix", key: "port" },
	HELIX_TIMEOUT: { section: "helix", key: "timeoutMs" },
	HELIX_MAX_RETRIES: { section: "helix", key: "maxRetries" },
	SEARCH_TOP_K: { section: "search", key: "topK" },
	SEARCH_MIN_SIMILARITY: { section: "search", key: "minSimilarity" },
	API_HOST: { section: "api", key: "host" },
	API_PORT: { section: "api", key: "port" },
	API_CORS_ORIGINS: { section: "api", key: "corsOrigins", list: true },
};
