/**
 * Repository Base Utilities
 *
 * Error classification and row helpers shared by repositories.
 */

import { DatabaseError } from "@secsearch/domain";
import type { z } from "zod";
import type { Row } from "../sqlite.js";

// ============================================
// Error Handling
// ============================================

/**
 * Error codes for repository operations
 */
export type RepositoryErrorCode =
	| "NOT_FOUND"
	| "CONSTRAINT_VIOLATION"
	| "DUPLICATE_KEY"
	| "INVALID_DATA"
	| "QUERY_ERROR";

/**
 * Registry failure with the table and a classified code.
 */
export class RepositoryError extends DatabaseError {
	constructor(
		message: string,
		public readonly code: RepositoryErrorCode,
		public readonly table?: string,
		cause?: unknown,
	) {
		super(message, {
			details: cause instanceof Error ? cause.message : undefined,
			cause,
		});
	}

	/**
	 * Classify a driver error by its message.
	 */
	static fromSqliteError(table: string, error: unknown, message?: string): RepositoryError {
		const text = error instanceof Error ? error.message : String(error);
		const lower = text.toLowerCase();

		if (lower.includes("unique constraint")) {
			return new RepositoryError(message ?? text, "DUPLICATE_KEY", table, error);
		}

		if (lower.includes("foreign key") || lower.includes("constraint")) {
			return new RepositoryError(message ?? text, "CONSTRAINT_VIOLATION", table, error);
		}

		return new RepositoryError(
			message ?? `Query error in ${table}: ${text}`,
			"QUERY_ERROR",
			table,
			error,
		);
	}
}

// ============================================
// Row Mapping
// ============================================

/**
 * Validate a row against its schema.
 */
export function mapRow<T>(table: string, schema: z.ZodType<T>, row: Row): T {
	const parsed = schema.safeParse(row);
	if (!parsed.success) {
		throw new RepositoryError(
			`Invalid row in ${table}`,
			"INVALID_DATA",
			table,
			new Error(parsed.error.message),
		);
	}
	return parsed.data;
}

export function mapRows<T>(table: string, schema: z.ZodType<T>, rows: Row[]): T[] {
	return rows.map((row) => mapRow(table, schema, row));
}

// ============================================
// Filters
// ============================================

/**
 * AND-combined equality WHERE clause; undefined values are skipped.
 */
export function whereEquals(filters: Record<string, string | undefined>): {
	clause: string;
	args: string[];
} {
	const conditions: string[] = [];
	const args: string[] = [];
	for (const [column, value] of Object.entries(filters)) {
		if (value !== undefined) {
			conditions.push(`${column} = ?`);
			args.push(value);
		}
	}
	return {
		clause: conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "",
		args,
	};
}
