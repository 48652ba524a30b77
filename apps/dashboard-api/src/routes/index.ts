export { filingsRoutes } from "./filings.js";
export { ingestRoutes } from "./ingest.js";
export { resourceRoutes } from "./resources.js";
export { searchRoutes } from "./search.js";
export { systemRoutes } from "./system.js";
