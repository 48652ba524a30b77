/**
 * HelixDB Client
 *
 * Client wrapper for HelixDB with lazy connection, per-query timeout and
 * retry with exponential backoff.
 */

import type { HelixSettings } from "@secsearch/config";

/**
 * HelixDB client configuration options.
 */
export interface HelixClientConfig {
	/** HelixDB server host (default: localhost) */
	host?: string;
	/** HelixDB server port (default: 6969) */
	port?: number;
	/** Per-query timeout in milliseconds (default: 5000) */
	timeout?: number;
	/** Maximum attempts for failed queries (default: 3) */
	maxRetries?: number;
	/** Base delay between retries in milliseconds (default: 100) */
	retryDelay?: number;
}

const DEFAULT_CONFIG: Required<HelixClientConfig> = {
	host: "localhost",
	port: 6969,
	timeout: 5000,
	maxRetries: 3,
	retryDelay: 100,
};

/**
 * The one call made against a HelixDB endpoint. helix-ts satisfies it;
 * tests pass an in-process stand-in.
 */
export interface HelixTransport {
	query(queryName: string, params: Record<string, unknown>): Promise<unknown>;
}

/**
 * Query result from HelixDB.
 */
export interface QueryResult<T = unknown> {
	data: T;
	executionTimeMs: number;
}

/**
 * HelixDB error codes.
 */
export type HelixErrorCode =
	| "CONNECTION_FAILED"
	| "QUERY_FAILED"
	| "TIMEOUT"
	| "INVALID_QUERY"
	| "NOT_FOUND"
	| "SCHEMA_ERROR";

/**
 * Error thrown by HelixDB operations.
 */
export class HelixError extends Error {
	constructor(
		message: string,
		public readonly code: HelixErrorCode,
		public override readonly cause?: Error,
	) {
		super(message);
		this.name = "HelixError";
	}
}

/**
 * Health check result from HelixDB.
 */
export interface HealthCheckResult {
	healthy: boolean;
	latencyMs: number;
	error?: string;
}

/**
 * @example
 * ```typescript
 * const client = createHelixClient({ port: 6969 });
 * const result = await client.query("CountFilingChunks");
 * client.close();
 * ```
 */
export interface HelixClient {
	/**
	 * Execute a compiled HelixQL query.
	 *
	 * @throws HelixError on failure
	 */
	query<T = unknown>(queryName: string, params?: Record<string, unknown>): Promise<QueryResult<T>>;

	isConnected(): boolean;

	/**
	 * Runs CountFilingChunks to check the server is responsive.
	 */
	healthCheck(): Promise<HealthCheckResult>;

	close(): void;

	getConfig(): Required<HelixClientConfig>;
}

/**
 * Create a HelixDB client. Without a transport, helix-ts is loaded on the
 * first query.
 */
export function createHelixClient(
	config: HelixClientConfig = {},
	transport?: HelixTransport,
): HelixClient {
	const mergedConfig: Required<HelixClientConfig> = {
		...DEFAULT_CONFIG,
		...config,
	};

	let connected = false;
	let instance: HelixTransport | null = transport ?? null;

	const getClient = async (): Promise<HelixTransport> => {
		if (instance) {
			connected = true;
			return instance;
		}

		let created: HelixTransport;
		try {
			const { HelixDB } = await import("helix-ts");
			created = new HelixDB(`http://${mergedConfig.host}:${mergedConfig.port}`);
		} catch (error) {
			throw new HelixError(
				`Failed to connect to HelixDB at ${mergedConfig.host}:${mergedConfig.port}`,
				"CONNECTION_FAILED",
				error instanceof Error ? error : undefined,
			);
		}
		instance = created;
		connected = true;
		return created;
	};

	const withTimeout = async (pending: Promise<unknown>): Promise<unknown> => {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(
				() => reject(new HelixError("Query timed out", "TIMEOUT")),
				mergedConfig.timeout,
			);
		});
		try {
			return await Promise.race([pending, timeout]);
		} finally {
			clearTimeout(timer);
		}
	};

	const executeWithRetry = async (
		queryName: string,
		params: Record<string, unknown>,
		attempt = 1,
	): Promise<QueryResult> => {
		const startTime = performance.now();

		try {
			const client = await getClient();
			const data = await withTimeout(client.query(queryName, params));
			return { data, executionTimeMs: performance.now() - startTime };
		} catch (error) {
			if (attempt < mergedConfig.maxRetries && isRetryable(error)) {
				// Exponential backoff
				await sleep(mergedConfig.retryDelay * 2 ** (attempt - 1));
				return executeWithRetry(queryName, params, attempt + 1);
			}

			if (error instanceof HelixError) {
				throw error;
			}

			throw new HelixError(
				`Query "${queryName}" failed: ${error instanceof Error ? error.message : "Unknown error"}`,
				"QUERY_FAILED",
				error instanceof Error ? error : undefined,
			);
		}
	};

	return {
		async query<T = unknown>(
			queryName: string,
			params: Record<string, unknown> = {},
		): Promise<QueryResult<T>> {
			const result = await executeWithRetry(queryName, params);
			// Response shapes are validated by callers
			return result as QueryResult<T>;
		},

		isConnected(): boolean {
			return connected;
		},

		async healthCheck(): Promise<HealthCheckResult> {
			const startTime = performance.now();
			try {
				await executeWithRetry("CountFilingChunks", {}, mergedConfig.maxRetries);
				return { healthy: true, latencyMs: performance.now() - startTime };
			} catch (error) {
				return {
					healthy: false,
					latencyMs: performance.now() - startTime,
					error: error instanceof Error ? error.message : "Unknown error",
				};
			}
		},

		close(): void {
			connected = false;
			instance = transport ?? null;
		},

		getConfig(): Required<HelixClientConfig> {
			return { ...mergedConfig };
		},
	};
}

/**
 * Create a HelixDB client from settings.
 */
export function createHelixClientFromSettings(
	settings: HelixSettings,
	transport?: HelixTransport,
): HelixClient {
	return createHelixClient(
		{
			host: settings.host,
			port: settings.port,
			timeout: settings.timeoutMs,
			maxRetries: settings.maxRetries,
		},
		transport,
	);
}

// ============================================================================
// Helpers
// ============================================================================

function isRetryable(error: unknown): boolean {
	if (error instanceof HelixError) {
		// Don't retry schema errors or invalid queries
		return !["SCHEMA_ERROR", "INVALID_QUERY", "NOT_FOUND"].includes(error.code);
	}
	// Retry network errors
	return true;
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
