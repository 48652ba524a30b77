/**
 * @secsearch/storage
 *
 * Metadata registry on SQLite, the vector store contract, and the
 * coordinator that keeps both in step.
 */

export {
	type BulkDeleteResult,
	type ClearAllResult,
	type DeleteFilingResult,
	FilingStore,
	type StoreStatus,
	type TickerBreakdown,
} from "./filing-store.js";
export {
	getMigrationStatus,
	type Migration,
	MigrationError,
	type MigrationResult,
	runMigrations,
} from "./migrations.js";
export { openRegistry } from "./registry.js";
export * from "./repositories/index.js";
export {
	type BatchStatement,
	createInMemoryClient,
	createLocalClient,
	type Row,
	type SqliteClient,
} from "./sqlite.js";
export type { VectorQuery, VectorStore } from "./vector-store.js";
