/**
 * Ingest request validation and the default-count policy shared by the
 * API and the CLI.
 */

import { parseFormTypes, SUPPORTED_FORMS, ValidationError } from "@secsearch/domain";
import { z } from "zod";
import { COUNT_MODES, type IngestRequest } from "./types.js";

// ============================================
// Schema
// ============================================

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const IngestRequestSchema = z.object({
	tickers: z
		.array(z.string())
		.transform((tickers) =>
			tickers.map((ticker) => ticker.trim().toUpperCase()).filter((ticker) => ticker.length > 0),
		)
		.refine((tickers) => tickers.length > 0, "At least one ticker is required"),
	formTypes: z.array(z.string()).default([...SUPPORTED_FORMS]),
	countMode: z.enum(COUNT_MODES).default("latest"),
	count: z.number().int().min(1).optional(),
	year: z.number().int().min(1993).optional(),
	startDate: z.string().regex(ISO_DATE, "Expected YYYY-MM-DD").optional(),
	endDate: z.string().regex(ISO_DATE, "Expected YYYY-MM-DD").optional(),
});

export type IngestRequestInput = z.input<typeof IngestRequestSchema>;

/**
 * Validate and normalise a request: tickers uppercased, forms checked and
 * de-duplicated, defaults applied.
 *
 * @throws ValidationError
 */
export function parseIngestRequest(input: unknown): IngestRequest {
	const parsed = IngestRequestSchema.safeParse(input);
	if (!parsed.success) {
		throw new ValidationError("Invalid ingest request", {
			details: parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
				.join("; "),
		});
	}

	const { startDate, endDate, ...rest } = parsed.data;
	if (startDate && endDate && startDate > endDate) {
		throw new ValidationError("Start date must not be after end date", {
			details: `${startDate} > ${endDate}`,
		});
	}

	return {
		...rest,
		tickers: [...new Set(rest.tickers)],
		formTypes: parseFormTypes(rest.formTypes),
		...(startDate !== undefined && { startDate }),
		...(endDate !== undefined && { endDate }),
	};
}

// ============================================
// Count Policy
// ============================================

export function hasDateFilters(request: Pick<IngestRequest, "year" | "startDate" | "endDate">): boolean {
	return (
		request.year !== undefined || request.startDate !== undefined || request.endDate !== undefined
	);
}

/**
 * Filings to fetch per form type.
 *
 * An explicit count always wins. Without one, a request with a year or date
 * filter takes every match (undefined, bounded by the configured maximum)
 * and a request without filters takes the latest filing only.
 */
export function effectiveCount(
	request: Pick<IngestRequest, "count" | "year" | "startDate" | "endDate">,
): number | undefined {
	if (request.count !== undefined) {
		return request.count;
	}
	return hasDateFilters(request) ? undefined : 1;
}

/**
 * Whether the request selects the newest `count` filings across forms.
 */
export function isCrossForm(request: Pick<IngestRequest, "countMode" | "count">): boolean {
	return request.countMode === "total" && request.count !== undefined;
}
