/**
 * Task Manager
 *
 * Runs ingestion requests as background jobs. A shared gate of size one
 * admits jobs in FIFO order, so only one job fetches, embeds and stores at
 * a time. Jobs are cancelled cooperatively through an AbortController; a
 * cancelled job removes every filing it stored.
 *
 * @example
 * ```typescript
 * const manager = new TaskManager({ fetcher, orchestrator, store });
 * manager.start();
 * const taskId = manager.createTask(parseIngestRequest({ tickers: ["AAPL"] }));
 * for await (const message of streamTaskEvents(manager, taskId)) {
 *   console.log(message.type);
 * }
 * ```
 */

import { randomUUID } from "node:crypto";
import {
	DatabaseError,
	errorMessage,
	FetchError,
	type FilingIdentifier,
	type FilingInfo,
	FilingLimitExceededError,
	isSecSearchError,
} from "@secsearch/domain";
import type {
	FetchedFiling,
	FilingFetcher,
	PipelineOrchestrator,
	ProcessOutcome,
} from "@secsearch/filings";
import type { FilingStore } from "@secsearch/storage";
import pLimit, { type LimitFunction } from "p-limit";
import { EventQueue } from "./event-queue.js";
import type { Logger } from "@secsearch/logger";
import { log } from "./logger.js";
import { effectiveCount, isCrossForm } from "./request.js";
import {
	type FilingResult,
	type IngestRequest,
	isTerminal,
	summarizeResult,
	type TaskEvent,
	type TaskInfo,
	type TaskProgress,
	type TaskStatus,
} from "./types.js";

// ============================================
// Constants
// ============================================

/** Fetching (0), Parsing, Chunking, Embedding, Storing (4) */
export const TASK_TOTAL_STEPS = 5;

export const DEFAULT_PRUNE_INTERVAL_MS = 60_000;
export const DEFAULT_TASK_TTL_MS = 60 * 60 * 1000;

// ============================================
// Types
// ============================================

export interface TaskManagerDeps {
	fetcher: FilingFetcher;
	orchestrator: PipelineOrchestrator;
	store: FilingStore;
}

export interface TaskManagerOptions {
	pruneIntervalMs?: number;
	/** How long a finished task stays listed */
	taskTtlMs?: number;
}

interface TaskRecord {
	taskId: string;
	request: IngestRequest;
	status: TaskStatus;
	progress: TaskProgress;
	results: FilingResult[];
	error: string | null;
	createdAt: Date;
	startedAt: Date | null;
	completedAt: Date | null;
	controller: AbortController;
	events: EventQueue<TaskEvent>;
	/** Accession numbers written by this task, for rollback */
	stored: string[];
	/** Bound to the short task id */
	logger: Logger;
}

function initialProgress(): TaskProgress {
	return {
		currentTicker: null,
		currentFormType: null,
		stepLabel: "",
		stepIndex: 0,
		stepTotal: TASK_TOTAL_STEPS,
		filingsDone: 0,
		filingsTotal: 0,
		filingsSkipped: 0,
		filingsFailed: 0,
	};
}

function toInfo(record: TaskRecord): TaskInfo {
	return {
		taskId: record.taskId,
		request: record.request,
		status: record.status,
		progress: { ...record.progress },
		results: [...record.results],
		error: record.error,
		createdAt: record.createdAt,
		startedAt: record.startedAt,
		completedAt: record.completedAt,
	};
}

function shortId(taskId: string): string {
	return taskId.slice(0, 8);
}

// ============================================
// Task Manager
// ============================================

export class TaskManager {
	private readonly tasks = new Map<string, TaskRecord>();
	private readonly gate: LimitFunction = pLimit(1);
	private readonly inFlight = new Set<Promise<void>>();
	private readonly pruneIntervalMs: number;
	private readonly taskTtlMs: number;
	private pruneTimer: ReturnType<typeof setInterval> | null = null;

	constructor(
		private readonly deps: TaskManagerDeps,
		options: TaskManagerOptions = {},
	) {
		this.pruneIntervalMs = options.pruneIntervalMs ?? DEFAULT_PRUNE_INTERVAL_MS;
		this.taskTtlMs = options.taskTtlMs ?? DEFAULT_TASK_TTL_MS;
	}

	// ============================================
	// Lifecycle
	// ============================================

	/**
	 * Start pruning finished tasks in the background.
	 */
	start(): void {
		if (this.pruneTimer) {
			return;
		}
		this.pruneTimer = setInterval(() => {
			this.pruneStaleTasks();
		}, this.pruneIntervalMs);
		this.pruneTimer.unref();
	}

	stop(): void {
		if (this.pruneTimer) {
			clearInterval(this.pruneTimer);
			this.pruneTimer = null;
		}
	}

	/**
	 * Resolves once every admitted and queued task has finished.
	 */
	async waitForIdle(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	// ============================================
	// Public API
	// ============================================

	/**
	 * Queue a task and return its id. The request must already be validated
	 * (see parseIngestRequest).
	 */
	createTask(request: IngestRequest): string {
		const taskId = randomUUID().replaceAll("-", "");
		const record: TaskRecord = {
			taskId,
			request,
			status: "pending",
			progress: initialProgress(),
			results: [],
			error: null,
			createdAt: new Date(),
			startedAt: null,
			completedAt: null,
			controller: new AbortController(),
			events: new EventQueue<TaskEvent>(),
			stored: [],
			logger: log.child({ taskId: shortId(taskId) }),
		};
		this.tasks.set(taskId, record);

		const job: Promise<void> = this.gate(() => this.runTask(record))
			.catch((error: unknown) => {
				record.logger.error({ error: errorMessage(error) }, "Task runner crashed");
			})
			.finally(() => {
				this.inFlight.delete(job);
			});
		this.inFlight.add(job);

		record.logger.info({ tickers: request.tickers, formTypes: request.formTypes }, "Task created");
		return taskId;
	}

	getTask(taskId: string): TaskInfo | undefined {
		const record = this.tasks.get(taskId);
		return record ? toInfo(record) : undefined;
	}

	/** Oldest first */
	listTasks(): TaskInfo[] {
		return [...this.tasks.values()]
			.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
			.map(toInfo);
	}

	/**
	 * Request cancellation. Returns false when the task is unknown or has
	 * already finished.
	 */
	cancelTask(taskId: string): boolean {
		const record = this.tasks.get(taskId);
		if (!record || isTerminal(record.status)) {
			return false;
		}
		record.controller.abort();
		record.logger.info({ status: record.status }, "Cancellation requested");
		return true;
	}

	hasActiveTask(): boolean {
		for (const record of this.tasks.values()) {
			if (!isTerminal(record.status)) {
				return true;
			}
		}
		return false;
	}

	/**
	 * Forget tasks that finished more than the TTL ago. Returns how many were
	 * removed.
	 */
	pruneStaleTasks(now: number = Date.now()): number {
		let pruned = 0;
		for (const [taskId, record] of this.tasks) {
			if (!isTerminal(record.status) || !record.completedAt) {
				continue;
			}
			if (now - record.completedAt.getTime() > this.taskTtlMs) {
				this.tasks.delete(taskId);
				pruned++;
			}
		}
		if (pruned > 0) {
			log.info({ pruned }, "Pruned stale tasks");
		}
		return pruned;
	}

	/**
	 * Event queue of a task, for stream readers.
	 */
	eventQueue(taskId: string): EventQueue<TaskEvent> | undefined {
		return this.tasks.get(taskId)?.events;
	}

	// ============================================
	// Runner
	// ============================================

	private async runTask(record: TaskRecord): Promise<void> {
		if (record.controller.signal.aborted) {
			this.finish(record, "cancelled", { type: "cancelled" });
			record.logger.info("Task cancelled while queued");
			return;
		}

		record.status = "running";
		record.startedAt = new Date();

		try {
			await this.execute(record);
		} catch (error) {
			const message = errorMessage(error);
			record.error = message;
			this.finish(record, "failed", {
				type: "failed",
				error: message,
				details: isSecSearchError(error) ? (error.details ?? null) : null,
			});
			record.logger.error({ error: message }, "Task failed unexpectedly");
		}
	}

	private async execute(record: TaskRecord): Promise<void> {
		const { orchestrator, store } = this.deps;
		const { signal } = record.controller;
		const { progress } = record;
		const { logger } = record;

		const work = await this.buildWorkList(record);
		progress.filingsTotal = work.length;

		for (const { filingId, html } of work) {
			if (signal.aborted) {
				await this.cancel(record);
				return;
			}

			const { ticker, formType, accessionNumber } = filingId;
			progress.currentTicker = ticker;
			progress.currentFormType = formType;
			progress.stepLabel = "Checking duplicate";
			progress.stepIndex = 1;

			if (await store.registry.isDuplicate(accessionNumber)) {
				progress.filingsSkipped++;
				progress.filingsDone++;
				this.push(record, {
					type: "filing_skipped",
					ticker,
					formType,
					accessionNumber,
					reason: "duplicate",
				});
				logger.info({ accessionNumber }, "Skipped duplicate filing");
				continue;
			}

			try {
				await store.registry.checkFilingLimit();
			} catch (error) {
				if (!(error instanceof FilingLimitExceededError)) {
					throw error;
				}
				record.error = error.message;
				this.finish(record, "failed", {
					type: "failed",
					error: error.message,
					details: error.details ?? null,
				});
				logger.warn({ current: error.currentCount, max: error.maxFilings }, "Filing limit reached");
				return;
			}

			let outcome: ProcessOutcome;
			try {
				outcome = await orchestrator.processFiling(filingId, html, {
					signal,
					onProgress: (step, index) => {
						progress.stepLabel = step;
						progress.stepIndex = index;
						this.push(record, {
							type: "step",
							ticker,
							formType,
							step,
							stepNumber: index,
							totalSteps: TASK_TOTAL_STEPS,
						});
					},
				});
			} catch (error) {
				if (!isSecSearchError(error)) {
					throw error;
				}
				this.failFiling(record, filingId, error.message);
				logger.warn({ accessionNumber, error: error.message }, "Processing failed");
				continue;
			}

			if (outcome.status === "cancelled" || signal.aborted) {
				await this.cancel(record);
				return;
			}

			const { filing } = outcome;
			progress.stepLabel = "Storing";
			progress.stepIndex = 4;
			this.push(record, {
				type: "step",
				ticker,
				formType,
				step: "Storing",
				stepNumber: 4,
				totalSteps: TASK_TOTAL_STEPS,
			});

			try {
				await store.storeFiling(filing);
			} catch (error) {
				if (!(error instanceof DatabaseError)) {
					throw error;
				}
				this.failFiling(record, filingId, error.message);
				logger.warn({ accessionNumber, error: error.message }, "Storage failed");
				continue;
			}

			record.stored.push(accessionNumber);
			const result: FilingResult = {
				ticker,
				formType,
				filingDate: filingId.filingDate,
				accessionNumber,
				segmentCount: filing.ingestResult.segmentCount,
				chunkCount: filing.ingestResult.chunkCount,
				durationSeconds: filing.ingestResult.durationSeconds,
			};
			record.results.push(result);
			progress.filingsDone++;
			this.push(record, { type: "filing_done", ...summarizeResult(result) });

			logger.info(
				{
					ticker,
					formType,
					filingDate: filingId.filingDate,
					chunks: result.chunkCount,
					durationSeconds: result.durationSeconds,
				},
				"Ingested filing",
			);
		}

		if (record.status === "running") {
			progress.stepLabel = "Complete";
			const summary = {
				ingested: record.results.length,
				skipped: progress.filingsSkipped,
				failed: progress.filingsFailed,
			};
			this.finish(record, "completed", {
				type: "completed",
				results: record.results.map(summarizeResult),
				summary,
			});
			logger.info(summary, "Task completed");
		}
	}

	// ============================================
	// Work List
	// ============================================

	/**
	 * Download every filing the task will process, in order. Fetch failures
	 * are logged and left out.
	 */
	private async buildWorkList(record: TaskRecord): Promise<FetchedFiling[]> {
		const { fetcher } = this.deps;
		const { request, progress, controller } = record;
		const { logger } = record;
		const filters = {
			year: request.year,
			startDate: request.startDate,
			endDate: request.endDate,
		};
		const work: FetchedFiling[] = [];

		for (const ticker of request.tickers) {
			if (controller.signal.aborted) {
				break;
			}
			progress.currentTicker = ticker;
			progress.stepLabel = "Fetching";
			progress.stepIndex = 0;

			if (isCrossForm(request)) {
				for (const info of await this.listAcrossForms(ticker, record)) {
					try {
						work.push(
							await fetcher.fetchByAccession(info.ticker, info.formType, info.accessionNumber),
						);
					} catch (error) {
						if (!(error instanceof FetchError)) {
							throw error;
						}
						logger.warn(
							{ accessionNumber: info.accessionNumber, error: error.message },
							"Fetch failed",
						);
					}
				}
				continue;
			}

			for (const formType of request.formTypes) {
				if (controller.signal.aborted) {
					break;
				}
				progress.currentFormType = formType;
				try {
					const fetched = await fetcher
						.fetch(ticker, formType, { ...filters, count: effectiveCount(request) })
						.toArray();
					work.push(...fetched);
				} catch (error) {
					if (!(error instanceof FetchError)) {
						throw error;
					}
					logger.warn({ ticker, formType, error: error.message }, "Fetch failed");
				}
			}
		}

		return work;
	}

	/** The newest `count` filings across the requested forms */
	private async listAcrossForms(ticker: string, record: TaskRecord): Promise<FilingInfo[]> {
		const { request } = record;
		const available: FilingInfo[] = [];

		for (const formType of request.formTypes) {
			try {
				available.push(
					...(await this.deps.fetcher.listAvailable(ticker, formType, {
						count: request.count,
						year: request.year,
						startDate: request.startDate,
						endDate: request.endDate,
					})),
				);
			} catch (error) {
				if (!(error instanceof FetchError)) {
					throw error;
				}
				record.logger.warn({ ticker, formType, error: error.message }, "Listing failed");
			}
		}

		return available
			.sort((a, b) => b.filingDate.localeCompare(a.filingDate))
			.slice(0, request.count);
	}

	// ============================================
	// Helpers
	// ============================================

	private push(record: TaskRecord, event: TaskEvent): void {
		record.events.push(event);
	}

	private finish(record: TaskRecord, status: TaskStatus, event: TaskEvent): void {
		record.status = status;
		record.completedAt = new Date();
		this.push(record, event);
	}

	private failFiling(record: TaskRecord, filingId: FilingIdentifier, error: string): void {
		record.progress.filingsFailed++;
		record.progress.filingsDone++;
		this.push(record, {
			type: "filing_failed",
			ticker: filingId.ticker,
			formType: filingId.formType,
			accessionNumber: filingId.accessionNumber,
			error,
		});
	}

	private async cancel(record: TaskRecord): Promise<void> {
		await this.rollback(record);
		this.finish(record, "cancelled", { type: "cancelled" });
		record.logger.info("Task cancelled");
	}

	/**
	 * Delete every filing this task stored, vectors first. Failures are
	 * logged and the remaining filings are still attempted.
	 */
	private async rollback(record: TaskRecord): Promise<void> {
		if (record.stored.length === 0) {
			return;
		}
		const { logger } = record;
		logger.info({ filings: record.stored.length }, "Rolling back stored filings");

		const removed = new Set<string>();
		for (const accessionNumber of record.stored) {
			try {
				await this.deps.store.deleteFiling(accessionNumber);
				removed.add(accessionNumber);
			} catch (error) {
				logger.error({ accessionNumber, error: errorMessage(error) }, "Rollback failed");
			}
		}

		record.stored = record.stored.filter((accession) => !removed.has(accession));
		record.results = record.results.filter((result) => !removed.has(result.accessionNumber));
	}
}
