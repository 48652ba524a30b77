/**
 * ingest add / ingest batch
 *
 * Queues one task on the in-process task manager and prints its events as
 * they arrive.
 */

import { parseArgs } from "node:util";
import { ValidationError } from "@secsearch/domain";
import type { Services } from "@secsearch/runtime";
import {
	type IngestRequest,
	type IngestRequestInput,
	parseIngestRequest,
	streamTaskEvents,
	type TaskEvent,
} from "@secsearch/tasks";
import { parseInteger, parseOrThrow } from "../args.js";
import { log } from "../logger.js";
import { type Output, paint } from "../output.js";

/** Exit code of a task cancelled with Ctrl+C */
export const CANCELLED_EXIT_CODE = 130;

export const INGEST_USAGE = `sec-search ingest add <TICKER> [options]
       sec-search ingest batch <TICKER>... [options]

Options:
  -f, --form <forms>      Comma-separated form types (default: 10-K,10-Q)
  -n, --number <n>        Filings per form type
  -t, --total <n>         Newest filings across all form types
  -y, --year <year>       Only filings from this year
      --start-date <date> Only filings on or after YYYY-MM-DD
      --end-date <date>   Only filings on or before YYYY-MM-DD`;

const INGEST_OPTIONS = {
	form: { type: "string", short: "f" },
	number: { type: "string", short: "n" },
	total: { type: "string", short: "t" },
	year: { type: "string", short: "y" },
	"start-date": { type: "string" },
	"end-date": { type: "string" },
	help: { type: "boolean", short: "h" },
} as const;

// ============================================
// Arguments
// ============================================

/**
 * Build an ingest request from `ingest add|batch` arguments.
 */
export function parseIngestArgs(subcommand: "add" | "batch", args: string[]): IngestRequest {
	const { values, positionals } = parseOrThrow(
		() => parseArgs({ args, options: INGEST_OPTIONS, allowPositionals: true }),
		INGEST_USAGE,
	);

	if (subcommand === "add" && positionals.length !== 1) {
		throw new ValidationError("ingest add takes exactly one ticker.", {
			details: `Received ${positionals.length}. Use 'ingest batch' for several tickers.`,
		});
	}
	if (values.number !== undefined && values.total !== undefined) {
		throw new ValidationError("--total and --number are mutually exclusive.");
	}

	const perForm = parseInteger(values.number, "--number");
	const total = parseInteger(values.total, "--total");

	const input: IngestRequestInput = {
		tickers: positionals,
		countMode: total !== undefined ? "total" : perForm !== undefined ? "per_form" : "latest",
		count: total ?? perForm,
		year: parseInteger(values.year, "--year"),
		startDate: values["start-date"],
		endDate: values["end-date"],
		...(values.form !== undefined && { formTypes: values.form.split(",") }),
	};
	return parseIngestRequest(input);
}

// ============================================
// Event Rendering
// ============================================

function describeRequest(request: IngestRequest): string {
	const parts = [request.tickers.join(", "), request.formTypes.join(", ")];
	if (request.count !== undefined) {
		parts.push(request.countMode === "total" ? `newest ${request.count}` : `${request.count} per form`);
	}
	if (request.year !== undefined) {
		parts.push(`year ${request.year}`);
	}
	if (request.startDate || request.endDate) {
		parts.push(`${request.startDate ?? "..."} to ${request.endDate ?? "..."}`);
	}
	return parts.join(" | ");
}

function renderEvent(output: Output, event: TaskEvent): void {
	switch (event.type) {
		case "step":
			output.write(
				`  ${event.ticker} ${event.formType}  [${event.stepNumber}/${event.totalSteps}] ${event.step}`,
			);
			return;
		case "filing_skipped":
			output.write(
				`  ${paint(output, "yellow", "Skipped")} ${event.accessionNumber}: already ingested`,
			);
			return;
		case "filing_failed":
			output.write(`  ${paint(output, "red", "Failed")} ${event.accessionNumber}: ${event.error}`);
			return;
		case "filing_done":
			output.write(
				`  ${paint(output, "green", "Ingested")} ${event.ticker} ${event.formType} ${event.filingDate}: ` +
					`${event.segments} segments, ${event.chunks} chunks in ${event.time}s`,
			);
			return;
		case "completed": {
			const { ingested, skipped, failed } = event.summary;
			output.write(`Done: ${ingested} ingested, ${skipped} skipped, ${failed} failed`);
			return;
		}
		case "failed":
			output.error(`${paint(output, "red", "Error:")} ${event.error}`);
			if (event.details) {
				output.error(`  ${paint(output, "dim", event.details)}`);
			}
			return;
		case "cancelled":
			output.write(paint(output, "yellow", "Cancelled. Filings stored by this task were removed."));
			return;
	}
}

// ============================================
// Command
// ============================================

export interface IngestRunOptions {
	/** Aborting cancels the task; it still rolls back before the command returns */
	signal?: AbortSignal;
	pollIntervalMs?: number;
}

/**
 * Run the request to completion. Returns the process exit code.
 */
export async function runIngest(
	services: Services,
	request: IngestRequest,
	output: Output,
	options: IngestRunOptions = {},
): Promise<number> {
	const { tasks } = services;
	const taskId = tasks.createTask(request);
	output.write(`Ingesting ${describeRequest(request)}`);

	const cancel = () => {
		log.info({ taskId: taskId.slice(0, 8) }, "Cancelling ingest on interrupt");
		tasks.cancelTask(taskId);
	};
	if (options.signal?.aborted) {
		cancel();
	} else {
		options.signal?.addEventListener("abort", cancel, { once: true });
	}

	let exitCode = 1;
	try {
		for await (const message of streamTaskEvents(tasks, taskId, {
			pollIntervalMs: options.pollIntervalMs,
		})) {
			if (message.type === "snapshot") {
				continue;
			}
			if (message.type === "error") {
				output.error(`${paint(output, "red", "Error:")} ${message.error}`);
				break;
			}
			renderEvent(output, message);
			if (message.type === "completed") {
				exitCode = 0;
			} else if (message.type === "cancelled") {
				exitCode = CANCELLED_EXIT_CODE;
			}
		}
	} finally {
		options.signal?.removeEventListener("abort", cancel);
	}

	await tasks.waitForIdle();
	return exitCode;
}
