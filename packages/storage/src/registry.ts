import type { DatabaseSettings } from "@secsearch/config";
import { runMigrations } from "./migrations.js";
import { FilingsRepository } from "./repositories/filings.js";
import { createLocalClient, type SqliteClient } from "./sqlite.js";

/**
 * Open the registry database, apply migrations and build the repository.
 */
export async function openRegistry(
	settings: DatabaseSettings,
): Promise<{ client: SqliteClient; repository: FilingsRepository }> {
	const client = await createLocalClient(settings.metadataDbPath);
	await runMigrations(client);
	return { client, repository: new FilingsRepository(client, settings.maxFilings) };
}
