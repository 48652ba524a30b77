/**
 * @secsearch/helix
 *
 * HelixDB client and the FilingChunk vector store.
 */

export {
	createHelixClient,
	createHelixClientFromSettings,
	type HealthCheckResult,
	type HelixClient,
	type HelixClientConfig,
	HelixError,
	type HelixErrorCode,
	type HelixTransport,
	type QueryResult,
} from "./client.js";
export { HELIX_QUERIES, HelixVectorStore } from "./vector-store.js";
