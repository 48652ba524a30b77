/**
 * @secsearch/mocks - In-process stand-ins for tests
 *
 * Deterministic replacements for HelixDB, SEC EDGAR and the embedding
 * model, so tests never reach the network.
 */

// ============================================
// Mock HelixDB
// ============================================

export {
	cosineSimilarity,
	createMockHelixDB,
	MockHelixDB,
	type MockHelixDBConfig,
	type StoredVector,
} from "./helixdb.js";

// ============================================
// Mock EDGAR
// ============================================

export {
	createMockEdgarSource,
	type MockCompany,
	MockEdgarSource,
	type MockEdgarConfig,
	type MockFiling,
} from "./edgar.js";

// ============================================
// Mock Embeddings
// ============================================

export { hashEmbedding, MockEmbeddingModel, MockModelLoader } from "./embedding.js";

// ============================================
// Fixtures
// ============================================

export { type FixtureName, loadFixture } from "./fixtures.js";
