/**
 * Task Types
 *
 * Ingestion requests, task state and the progress events streamed to
 * WebSocket clients and the CLI.
 */

import type { FormType } from "@secsearch/domain";

// ============================================
// Requests
// ============================================

/**
 * - `latest`: one filing per form unless a count or filters say otherwise
 * - `per_form`: `count` filings of each form
 * - `total`: the newest `count` filings across all forms
 */
export const COUNT_MODES = ["latest", "per_form", "total"] as const;

export type CountMode = (typeof COUNT_MODES)[number];

export interface IngestRequest {
	tickers: string[];
	formTypes: FormType[];
	countMode: CountMode;
	count?: number;
	year?: number;
	/** YYYY-MM-DD, inclusive */
	startDate?: string;
	/** YYYY-MM-DD, inclusive */
	endDate?: string;
}

// ============================================
// Task State
// ============================================

export type TaskStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set([
	"completed",
	"failed",
	"cancelled",
]);

export function isTerminal(status: TaskStatus): boolean {
	return TERMINAL_STATUSES.has(status);
}

export interface TaskProgress {
	currentTicker: string | null;
	currentFormType: string | null;
	stepLabel: string;
	stepIndex: number;
	stepTotal: number;
	filingsDone: number;
	filingsTotal: number;
	filingsSkipped: number;
	filingsFailed: number;
}

export interface FilingResult {
	ticker: string;
	formType: string;
	filingDate: string;
	accessionNumber: string;
	segmentCount: number;
	chunkCount: number;
	durationSeconds: number;
}

/**
 * Read-only view of a task, as returned by the manager.
 */
export interface TaskInfo {
	taskId: string;
	request: IngestRequest;
	status: TaskStatus;
	progress: TaskProgress;
	results: FilingResult[];
	error: string | null;
	createdAt: Date;
	startedAt: Date | null;
	completedAt: Date | null;
}

// ============================================
// Events
// ============================================

/** A filing result as it appears in events */
export interface ResultSummary {
	ticker: string;
	formType: string;
	filingDate: string;
	accessionNumber: string;
	segments: number;
	chunks: number;
	/** Seconds, one decimal */
	time: number;
}

export type TaskEvent =
	| {
			type: "step";
			ticker: string;
			formType: string;
			step: string;
			stepNumber: number;
			totalSteps: number;
	  }
	| {
			type: "filing_skipped";
			ticker: string;
			formType: string;
			accessionNumber: string;
			reason: "duplicate";
	  }
	| {
			type: "filing_failed";
			ticker: string;
			formType: string;
			accessionNumber: string;
			error: string;
	  }
	| ({ type: "filing_done" } & ResultSummary)
	| {
			type: "completed";
			results: ResultSummary[];
			summary: { ingested: number; skipped: number; failed: number };
	  }
	| { type: "failed"; error: string; details: string | null }
	| { type: "cancelled" };

export type TerminalEvent = Extract<TaskEvent, { type: "completed" | "failed" | "cancelled" }>;

export function isTerminalEvent(event: TaskEvent): event is TerminalEvent {
	return event.type === "completed" || event.type === "failed" || event.type === "cancelled";
}

export interface SnapshotMessage {
	type: "snapshot";
	taskId: string;
	status: TaskStatus;
	progress: TaskProgress;
	results: ResultSummary[];
}

export interface ErrorMessage {
	type: "error";
	error: string;
}

/** Everything a stream reader can receive */
export type StreamMessage = SnapshotMessage | ErrorMessage | TaskEvent;

export function summarizeResult(result: FilingResult): ResultSummary {
	return {
		ticker: result.ticker,
		formType: result.formType,
		filingDate: result.filingDate,
		accessionNumber: result.accessionNumber,
		segments: result.segmentCount,
		chunks: result.chunkCount,
		time: Math.round(result.durationSeconds * 10) / 10,
	};
}
