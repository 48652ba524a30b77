/**
 * API Error Mapping
 *
 * Every failure leaves the API as `{error, message, details, hint}`.
 * SecSearchError categories pick the status code; ApiError covers
 * request-level failures such as missing resources and conflicts.
 */

import { z } from "@hono/zod-openapi";
import { isSecSearchError, type SecSearchError } from "@secsearch/domain";
import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import log from "./logger.js";

// ============================================
// Body
// ============================================

export const ErrorBodySchema = z
	.object({
		error: z.string(),
		message: z.string(),
		details: z.string().nullable(),
		hint: z.string().nullable(),
	})
	.openapi("ErrorBody");

export type ErrorBody = z.infer<typeof ErrorBodySchema>;

export function errorResponse(description: string) {
	return {
		content: { "application/json": { schema: ErrorBodySchema } },
		description,
	};
}

// ============================================
// Request Errors
// ============================================

export class ApiError extends Error {
	constructor(
		readonly status: ContentfulStatusCode,
		readonly code: string,
		message: string,
		readonly details: string | null = null,
		readonly hint: string | null = null,
	) {
		super(message);
		this.name = "ApiError";
	}
}

export function notFound(message: string): ApiError {
	return new ApiError(404, "not_found", message);
}

export function conflict(message: string, hint: string | null = null): ApiError {
	return new ApiError(409, "conflict", message, null, hint);
}

export function badRequest(message: string, details: string | null = null): ApiError {
	return new ApiError(400, "validation_error", message, details);
}

// ============================================
// Status Mapping
// ============================================

export function statusFor(error: SecSearchError): ContentfulStatusCode {
	switch (error.category) {
		case "validation_error":
			return 400;
		case "search_error":
			return error.message === "Empty search query" ? 400 : 500;
		case "fetch_error":
			return 502;
		case "filing_limit_exceeded":
			return 409;
		default:
			return 500;
	}
}

interface Issue {
	path: readonly PropertyKey[];
	message: string;
}

export function describeIssues(issues: readonly Issue[]): string {
	return issues
		.map((issue) => `${issue.path.map(String).join(".") || "body"}: ${issue.message}`)
		.join("; ");
}

/**
 * Root error handler.
 */
export function handleError(error: Error, c: Context) {
	if (error instanceof ApiError) {
		const body: ErrorBody = {
			error: error.code,
			message: error.message,
			details: error.details,
			hint: error.hint,
		};
		return c.json(body, error.status);
	}

	if (isSecSearchError(error)) {
		const status = statusFor(error);
		const body: ErrorBody = {
			error: error.category === "search_error" && status === 400 ? "validation_error" : error.category,
			message: error.message,
			details: error.details ?? null,
			hint: error.hint,
		};
		if (status >= 500) {
			log.error({ path: c.req.path, error: error.toJSON() }, "Request failed");
		}
		return c.json(body, status);
	}

	if (error instanceof HTTPException) {
		const body: ErrorBody = {
			error: "http_error",
			message: error.message,
			details: null,
			hint: null,
		};
		return c.json(body, error.status);
	}

	log.error({ path: c.req.path, error: error.message, stack: error.stack }, "Unhandled error");
	const body: ErrorBody = {
		error: "internal_error",
		message: "Internal server error",
		details: error.message,
		hint: null,
	};
	return c.json(body, 500);
}
