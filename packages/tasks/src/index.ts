/**
 * @secsearch/tasks
 *
 * Background ingestion tasks: admission, cancellation with rollback, and
 * progress streaming.
 */

export { EventQueue } from "./event-queue.js";
export {
	effectiveCount,
	hasDateFilters,
	type IngestRequestInput,
	IngestRequestSchema,
	isCrossForm,
	parseIngestRequest,
} from "./request.js";
export {
	buildSnapshot,
	DEFAULT_POLL_INTERVAL_MS,
	type StreamOptions,
	streamTaskEvents,
} from "./stream.js";
export {
	DEFAULT_PRUNE_INTERVAL_MS,
	DEFAULT_TASK_TTL_MS,
	TASK_TOTAL_STEPS,
	TaskManager,
	type TaskManagerDeps,
	type TaskManagerOptions,
} from "./task-manager.js";
export * from "./types.js";
