import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { log } from "./logger.js";
import type { SqliteClient } from "./sqlite.js";

export interface Migration {
	version: number;
	name: string;
	filename: string;
	sql: string;
}

export interface AppliedMigration {
	version: number;
	name: string;
	applied_at: string;
	[key: string]: unknown; // Row compatibility
}

export interface MigrationResult {
	applied: Migration[];
	currentVersion: number;
	durationMs: number;
}

export interface MigrationOptions {
	migrationsDir?: string;
	targetVersion?: number;
	logger?: (message: string) => void;
}

const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL("../migrations", import.meta.url));

const MIGRATION_FILE_PATTERN = /^(\d{3})_(.+)\.sql$/;

export async function runMigrations(
	client: SqliteClient,
	options: MigrationOptions = {},
): Promise<MigrationResult> {
	const {
		migrationsDir = DEFAULT_MIGRATIONS_DIR,
		targetVersion,
		logger = (msg: string) => log.debug({}, msg),
	} = options;

	const startTime = Date.now();

	await ensureMigrationsTable(client);

	const appliedVersions = new Set((await getAppliedMigrations(client)).map((m) => m.version));
	const currentVersion = Math.max(0, ...appliedVersions);

	const pendingMigrations = (await loadMigrations(migrationsDir))
		.filter((m) => !appliedVersions.has(m.version))
		.filter((m) => (targetVersion !== undefined ? m.version <= targetVersion : true));

	if (pendingMigrations.length === 0) {
		logger("No pending migrations");
		return { applied: [], currentVersion, durationMs: Date.now() - startTime };
	}

	const applied: Migration[] = [];

	for (const migration of pendingMigrations) {
		logger(`Applying migration ${migration.version}: ${migration.name}`);
		try {
			await client.batch([
				...splitStatements(migration.sql).map((sql) => ({ sql })),
				{
					sql: "INSERT INTO schema_migrations (version, name) VALUES (?, ?)",
					args: [migration.version, migration.name],
				},
			]);
			applied.push(migration);
		} catch (error) {
			throw new MigrationError(
				`Migration ${migration.version} (${migration.name}) failed`,
				migration,
				error,
			);
		}
	}

	const newVersion = applied.at(-1)?.version ?? currentVersion;
	logger(`Applied ${applied.length} migration(s). Current version: ${newVersion}`);

	return { applied, currentVersion: newVersion, durationMs: Date.now() - startTime };
}

export async function getMigrationStatus(
	client: SqliteClient,
	options: Pick<MigrationOptions, "migrationsDir"> = {},
): Promise<{ currentVersion: number; applied: AppliedMigration[]; pending: Migration[] }> {
	const { migrationsDir = DEFAULT_MIGRATIONS_DIR } = options;

	await ensureMigrationsTable(client);

	const applied = await getAppliedMigrations(client);
	const appliedVersions = new Set(applied.map((m) => m.version));
	const pending = (await loadMigrations(migrationsDir)).filter(
		(m) => !appliedVersions.has(m.version),
	);

	return { currentVersion: Math.max(0, ...appliedVersions), applied, pending };
}

async function ensureMigrationsTable(client: SqliteClient): Promise<void> {
	await client.run(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

async function getAppliedMigrations(client: SqliteClient): Promise<AppliedMigration[]> {
	return client.execute<AppliedMigration>(
		"SELECT version, name, applied_at FROM schema_migrations ORDER BY version",
	);
}

async function loadMigrations(dir: string): Promise<Migration[]> {
	let files: string[];
	try {
		files = await readdir(dir);
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			throw new Error(`Migrations directory not found: ${dir}`);
		}
		throw error;
	}

	const migrations: Migration[] = [];
	for (const file of files) {
		const match = file.match(MIGRATION_FILE_PATTERN);
		const versionStr = match?.[1];
		if (!match || versionStr === undefined) {
			continue;
		}
		migrations.push({
			version: Number.parseInt(versionStr, 10),
			name: match[2] ?? "",
			filename: file,
			sql: await readFile(`${dir}/${file}`, "utf8"),
		});
	}

	return migrations.sort((a, b) => a.version - b.version);
}

export function splitStatements(sql: string): string[] {
	const withoutComments = sql.replace(/--[^\n]*$/gm, "").replace(/\/\*[\s\S]*?\*\//g, "");

	// Simple semicolon split works for migration files (no semicolons in string literals)
	return withoutComments
		.split(";")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}

export class MigrationError extends Error {
	constructor(
		message: string,
		public readonly migration: Migration,
		public override readonly cause: unknown,
	) {
		super(message);
		this.name = "MigrationError";
	}
}
