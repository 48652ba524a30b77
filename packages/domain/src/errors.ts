/**
 * Error Taxonomy
 *
 * Every failure the ingestion pipeline, the stores and the front ends can
 * raise is a SecSearchError subclass. Each class carries a machine-readable
 * category (used as the `error` field of API error bodies) and a remediation
 * hint (printed by the CLI under the message).
 *
 * | Class                      | Category               |
 * |----------------------------|------------------------|
 * | ConfigurationError         | configuration_error    |
 * | ValidationError            | validation_error       |
 * | FetchError                 | fetch_error            |
 * | ParseError                 | parse_error            |
 * | ChunkingError              | chunking_error         |
 * | EmbeddingError             | embedding_error        |
 * | DatabaseError              | database_error         |
 * | FilingLimitExceededError   | filing_limit_exceeded  |
 * | SearchError                | search_error           |
 */

// ============================================
// Categories
// ============================================

export type ErrorCategory =
	| "configuration_error"
	| "validation_error"
	| "fetch_error"
	| "parse_error"
	| "chunking_error"
	| "embedding_error"
	| "database_error"
	| "filing_limit_exceeded"
	| "search_error";

export interface SecSearchErrorOptions {
	/** Additional context shown after the message */
	details?: string;
	/** Overrides the class default remediation hint */
	hint?: string;
	cause?: unknown;
}

// ============================================
// Base Error Class
// ============================================

/**
 * Base class for all application errors.
 */
export abstract class SecSearchError extends Error {
	readonly category: ErrorCategory;
	readonly details?: string;
	readonly hint: string;

	protected constructor(
		message: string,
		category: ErrorCategory,
		defaultHint: string,
		options: SecSearchErrorOptions = {},
	) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.category = category;
		this.details = options.details;
		this.hint = options.hint ?? defaultHint;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Message with details appended, as shown to users.
	 */
	toFormattedString(): string {
		return this.details ? `${this.message} — ${this.details}` : this.message;
	}

	/**
	 * Convert to JSON for logging
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			category: this.category,
			message: this.message,
			details: this.details,
			hint: this.hint,
			stack: this.stack,
		};
	}
}

// ============================================
// Specific Error Classes
// ============================================

export class ConfigurationError extends SecSearchError {
	constructor(message: string, options: SecSearchErrorOptions = {}) {
		super(
			message,
			"configuration_error",
			"Check your environment variables and sec-search.yaml.",
			options,
		);
	}
}

/**
 * Invalid user input (form types, tickers, dates).
 */
export class ValidationError extends SecSearchError {
	constructor(message: string, options: SecSearchErrorOptions = {}) {
		super(message, "validation_error", "Check the command arguments and try again.", options);
	}
}

/**
 * Filing source failure: unknown ticker, no matching filings, network errors.
 */
export class FetchError extends SecSearchError {
	constructor(message: string, options: SecSearchErrorOptions = {}) {
		super(
			message,
			"fetch_error",
			"Check the ticker symbol and your network connection. SEC EDGAR may also be rate limiting requests.",
			options,
		);
	}
}

export class ParseError extends SecSearchError {
	constructor(message: string, options: SecSearchErrorOptions = {}) {
		super(
			message,
			"parse_error",
			"The filing format may be unsupported. Try a different filing.",
			options,
		);
	}
}

export class ChunkingError extends SecSearchError {
	constructor(message: string, options: SecSearchErrorOptions = {}) {
		super(message, "chunking_error", "The filing produced no content to index.", options);
	}
}

export class EmbeddingError extends SecSearchError {
	constructor(message: string, options: SecSearchErrorOptions = {}) {
		super(
			message,
			"embedding_error",
			"Check GOOGLE_GENERATIVE_AI_API_KEY or lower EMBEDDING_BATCH_SIZE.",
			options,
		);
	}
}

/**
 * Vector store or metadata registry failure.
 */
export class DatabaseError extends SecSearchError {
	constructor(
		message: string,
		options: SecSearchErrorOptions = {},
		category: ErrorCategory = "database_error",
		defaultHint = "Check disk space and that HelixDB is running.",
	) {
		super(message, category, defaultHint, options);
	}
}

/**
 * Raised before storing a filing when the registry is at capacity.
 */
export class FilingLimitExceededError extends DatabaseError {
	readonly currentCount: number;
	readonly maxFilings: number;

	constructor(currentCount: number, maxFilings: number) {
		super(
			`Filing limit exceeded: ${currentCount}/${maxFilings} filings stored.`,
			{ details: "Remove existing filings or increase DB_MAX_FILINGS." },
			"filing_limit_exceeded",
			"Run 'sec-search manage remove <accession>' or raise DB_MAX_FILINGS.",
		);
		this.currentCount = currentCount;
		this.maxFilings = maxFilings;
	}
}

export class SearchError extends SecSearchError {
	constructor(message: string, options: SecSearchErrorOptions = {}) {
		super(message, "search_error", "Make sure filings have been ingested.", options);
	}
}

// ============================================
// Helpers
// ============================================

/**
 * Type guard for application errors
 */
export function isSecSearchError(error: unknown): error is SecSearchError {
	return error instanceof SecSearchError;
}

/**
 * Best-effort message extraction for logging unknown throwables.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
