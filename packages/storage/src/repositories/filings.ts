/**
 * Filings Repository
 *
 * Registry of ingested filings: duplicate detection, the filing limit,
 * listing and counts. One row per filing; the chunks live in the vector store.
 */

import {
	type FilingIdentifier,
	FilingLimitExceededError,
	type FilingRecord,
	FormTypeSchema,
} from "@secsearch/domain";
import { z } from "zod";
import { log } from "../logger.js";
import type { SqliteClient } from "../sqlite.js";
import { mapRow, mapRows, RepositoryError, whereEquals } from "./base.js";

// ============================================
// Types
// ============================================

export interface FilingFilters {
	ticker?: string;
	formType?: string;
}

const FilingRowSchema = z
	.object({
		id: z.number().int(),
		ticker: z.string(),
		form_type: FormTypeSchema,
		filing_date: z.string(),
		accession_number: z.string(),
		chunk_count: z.number().int(),
		ingested_at: z.string(),
	})
	.transform(
		(row): FilingRecord => ({
			id: row.id,
			ticker: row.ticker,
			formType: row.form_type,
			filingDate: row.filing_date,
			accessionNumber: row.accession_number,
			chunkCount: row.chunk_count,
			ingestedAt: row.ingested_at,
		}),
	);

function filterClause(filters: FilingFilters) {
	return whereEquals({
		ticker: filters.ticker?.toUpperCase(),
		form_type: filters.formType?.toUpperCase(),
	});
}

// ============================================
// Filings Repository
// ============================================

export class FilingsRepository {
	private readonly table = "filings";

	constructor(
		private readonly client: SqliteClient,
		private readonly maxFilings: number,
	) {}

	get limit(): number {
		return this.maxFilings;
	}

	// ============================================
	// Pre-ingestion checks
	// ============================================

	async isDuplicate(accessionNumber: string): Promise<boolean> {
		try {
			const row = await this.client.get(
				`SELECT 1 AS found FROM ${this.table} WHERE accession_number = ? LIMIT 1`,
				[accessionNumber],
			);
			return row !== undefined;
		} catch (error) {
			throw RepositoryError.fromSqliteError(
				this.table,
				error,
				"Failed to check for duplicate filing",
			);
		}
	}

	/**
	 * Throws FilingLimitExceededError when the registry is full.
	 */
	async checkFilingLimit(): Promise<void> {
		const current = await this.count();
		if (current >= this.maxFilings) {
			throw new FilingLimitExceededError(current, this.maxFilings);
		}
	}

	// ============================================
	// Writes
	// ============================================

	async registerFiling(filingId: FilingIdentifier, chunkCount: number): Promise<FilingRecord> {
		const ingestedAt = new Date().toISOString();
		let id: bigint;

		try {
			const result = await this.client.run(
				`INSERT INTO ${this.table} (
          ticker, form_type, filing_date, accession_number, chunk_count, ingested_at
        ) VALUES (?, ?, ?, ?, ?, ?)`,
				[
					filingId.ticker,
					filingId.formType,
					filingId.filingDate,
					filingId.accessionNumber,
					chunkCount,
					ingestedAt,
				],
			);
			id = result.lastInsertRowid;
		} catch (error) {
			const duplicate =
				RepositoryError.fromSqliteError(this.table, error).code === "DUPLICATE_KEY";
			throw RepositoryError.fromSqliteError(
				this.table,
				error,
				duplicate
					? `Filing already exists: ${filingId.accessionNumber}`
					: "Failed to register filing",
			);
		}

		log.info(
			{
				ticker: filingId.ticker,
				formType: filingId.formType,
				filingDate: filingId.filingDate,
				chunkCount,
			},
			"Registered filing",
		);

		return {
			id: Number(id),
			ticker: filingId.ticker,
			formType: filingId.formType,
			filingDate: filingId.filingDate,
			accessionNumber: filingId.accessionNumber,
			chunkCount,
			ingestedAt,
		};
	}

	/**
	 * @returns false when no such filing is registered
	 */
	async removeFiling(accessionNumber: string): Promise<boolean> {
		let changes: number;
		try {
			({ changes } = await this.client.run(
				`DELETE FROM ${this.table} WHERE accession_number = ?`,
				[accessionNumber],
			));
		} catch (error) {
			throw RepositoryError.fromSqliteError(this.table, error, "Failed to remove filing");
		}

		if (changes > 0) {
			log.info({ accessionNumber }, "Removed filing from registry");
		} else {
			log.warn({ accessionNumber }, "Filing not found in registry");
		}
		return changes > 0;
	}

	/**
	 * @returns number of rows removed
	 */
	async clearAll(): Promise<number> {
		try {
			const { changes } = await this.client.run(`DELETE FROM ${this.table}`);
			log.info({ removed: changes }, "Cleared filing registry");
			return changes;
		} catch (error) {
			throw RepositoryError.fromSqliteError(this.table, error, "Failed to clear filings");
		}
	}

	// ============================================
	// Reads
	// ============================================

	async getFiling(accessionNumber: string): Promise<FilingRecord | null> {
		try {
			const row = await this.client.get(
				`SELECT * FROM ${this.table} WHERE accession_number = ?`,
				[accessionNumber],
			);
			return row ? mapRow(this.table, FilingRowSchema, row) : null;
		} catch (error) {
			if (error instanceof RepositoryError) {
				throw error;
			}
			throw RepositoryError.fromSqliteError(this.table, error, "Failed to retrieve filing");
		}
	}

	/**
	 * Newest filing date first.
	 */
	async listFilings(filters: FilingFilters = {}): Promise<FilingRecord[]> {
		const { clause, args } = filterClause(filters);
		try {
			const rows = await this.client.execute(
				`SELECT * FROM ${this.table}${clause} ORDER BY filing_date DESC, id DESC`,
				args,
			);
			return mapRows(this.table, FilingRowSchema, rows);
		} catch (error) {
			if (error instanceof RepositoryError) {
				throw error;
			}
			throw RepositoryError.fromSqliteError(this.table, error, "Failed to list filings");
		}
	}

	async count(filters: FilingFilters = {}): Promise<number> {
		const { clause, args } = filterClause(filters);
		try {
			const row = await this.client.get<{ count: number }>(
				`SELECT COUNT(*) AS count FROM ${this.table}${clause}`,
				args,
			);
			return row?.count ?? 0;
		} catch (error) {
			throw RepositoryError.fromSqliteError(this.table, error, "Failed to count filings");
		}
	}
}
