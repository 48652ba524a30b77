/**
 * SQLite Client
 *
 * Small async facade over better-sqlite3 so repositories do not depend on
 * the driver. File-backed for the CLI and API, in-memory for tests.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type BetterSqlite3 from "better-sqlite3";

export type Row = Record<string, unknown>;

export interface BatchStatement {
	sql: string;
	args?: unknown[];
}

export interface SqliteClient {
	execute<T extends Row = Row>(sql: string, args?: unknown[]): Promise<T[]>;
	get<T extends Row = Row>(sql: string, args?: unknown[]): Promise<T | undefined>;
	/** Runs all statements in one transaction */
	batch(statements: BatchStatement[]): Promise<void>;
	run(sql: string, args?: unknown[]): Promise<{ changes: number; lastInsertRowid: bigint }>;
	close(): void;
}

type Database = BetterSqlite3.Database;

function wrap(db: Database): SqliteClient {
	return {
		async execute<T extends Row = Row>(sql: string, args: unknown[] = []): Promise<T[]> {
			return db.prepare(sql).all(...args) as T[];
		},

		async get<T extends Row = Row>(sql: string, args: unknown[] = []): Promise<T | undefined> {
			return db.prepare(sql).get(...args) as T | undefined;
		},

		async batch(statements: BatchStatement[]): Promise<void> {
			const runAll = db.transaction((items: BatchStatement[]) => {
				for (const { sql, args } of items) {
					db.prepare(sql).run(...(args ?? []));
				}
			});
			runAll(statements);
		},

		async run(
			sql: string,
			args: unknown[] = [],
		): Promise<{ changes: number; lastInsertRowid: bigint }> {
			const result = db.prepare(sql).run(...args);
			return {
				changes: result.changes,
				lastInsertRowid: BigInt(result.lastInsertRowid),
			};
		},

		close(): void {
			db.close();
		},
	};
}

/**
 * Open (creating if needed) a database file. Parent directories are created.
 */
export async function createLocalClient(path: string): Promise<SqliteClient> {
	const { default: Database } = await import("better-sqlite3");
	mkdirSync(dirname(path), { recursive: true });
	const db = new Database(path);
	db.pragma("journal_mode = WAL");
	return wrap(db);
}

export async function createInMemoryClient(): Promise<SqliteClient> {
	const { default: Database } = await import("better-sqlite3");
	return wrap(new Database(":memory:"));
}
