/**
 * CLI tests: every command runs in process against mock services and
 * writes to a recording output.
 */

import { DEFAULT_SETTINGS } from "@secsearch/config";
import { createMockEdgarSource, MockHelixDB, MockModelLoader } from "@secsearch/mocks";
import { createServices, type Services } from "@secsearch/runtime";
import { createInMemoryClient } from "@secsearch/storage";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type CliDeps, runCli } from "./cli.js";
import { CANCELLED_EXIT_CODE } from "./commands/ingest.js";
import type { Output } from "./output.js";

// ============================================
// Harness
// ============================================

class RecordingOutput implements Output {
	readonly color = false;
	readonly lines: string[] = [];
	readonly errors: string[] = [];
	readonly questions: string[] = [];

	constructor(private readonly answer = false) {}

	write(line = ""): void {
		this.lines.push(line);
	}

	error(line = ""): void {
		this.errors.push(line);
	}

	async confirm(question: string): Promise<boolean> {
		this.questions.push(question);
		return this.answer;
	}
}

let services: Services;
let opened = 0;
let closed = 0;

async function build(withEdgar = true): Promise<void> {
	services = await createServices(DEFAULT_SETTINGS, {
		sqlite: await createInMemoryClient(),
		helixTransport: new MockHelixDB(),
		modelLoader: new MockModelLoader(),
		edgar: withEdgar ? createMockEdgarSource() : undefined,
	});
}

function deps(extra: CliDeps = {}): CliDeps {
	return {
		openServices: async () => {
			opened++;
			return {
				...services,
				close: async () => {
					closed++;
				},
			};
		},
		pollIntervalMs: 5,
		...extra,
	};
}

async function run(argv: string[], output = new RecordingOutput(), extra: CliDeps = {}) {
	const code = await runCli(argv, output, deps(extra));
	return { code, output };
}

beforeEach(async () => {
	opened = 0;
	closed = 0;
	await build();
});

afterEach(async () => {
	await services.close();
});

// ============================================
// Top level
// ============================================

describe("sec-search", () => {
	test("--version prints the version without opening services", async () => {
		const { code, output } = await run(["--version"]);

		expect(code).toBe(0);
		expect(output.lines).toEqual(["sec-search 0.1.0"]);
		expect(opened).toBe(0);
	});

	test("no arguments prints usage and fails", async () => {
		const { code, output } = await run([]);

		expect(code).toBe(1);
		expect(output.lines[0]).toMatch(/^sec-search: semantic search over SEC 10-K and 10-Q filings/);
	});

	test("unknown commands print an error with a hint", async () => {
		const { code, output } = await run(["frobnicate"]);

		expect(code).toBe(1);
		expect(output.errors).toEqual([
			"Error: Unknown command: frobnicate",
			"  Hint: Run 'sec-search --help' for usage.",
		]);
	});
});

// ============================================
// ingest
// ============================================

describe("ingest", () => {
	test("add prints each step and a summary", async () => {
		const { code, output } = await run(["ingest", "add", "acme", "-f", "10-K"]);

		expect(code).toBe(0);
		expect(output.lines.slice(0, 6)).toEqual([
			"Ingesting ACME | 10-K",
			"  ACME 10-K  [1/5] Parsing",
			"  ACME 10-K  [2/5] Chunking",
			"  ACME 10-K  [3/5] Embedding",
			"  ACME 10-K  [4/5] Complete",
			"  ACME 10-K  [4/5] Storing",
		]);
		expect(output.lines[6]).toMatch(
			/^ {2}Ingested ACME 10-K 2024-02-20: \d+ segments, \d+ chunks in [\d.]+s$/,
		);
		expect(output.lines[7]).toBe("Done: 1 ingested, 0 skipped, 0 failed");
		expect(opened).toBe(1);
		expect(closed).toBe(1);
	});

	test("batch with a per-form count ingests every match", async () => {
		const { code, output } = await run(["ingest", "batch", "ACME", "BOLT", "-f", "10-K", "-n", "2"]);

		expect(code).toBe(0);
		expect(output.lines[0]).toBe("Ingesting ACME, BOLT | 10-K | 2 per form");
		expect(output.lines.at(-1)).toBe("Done: 4 ingested, 0 skipped, 0 failed");
		expect(await services.registry.count()).toBe(4);
	});

	test("already ingested filings are reported as skipped", async () => {
		await run(["ingest", "add", "ACME", "-f", "10-K"]);

		const { code, output } = await run(["ingest", "add", "ACME", "-f", "10-K"]);

		expect(code).toBe(0);
		expect(output.lines).toContain("  Skipped 0001000001-24-000010: already ingested");
		expect(output.lines.at(-1)).toBe("Done: 0 ingested, 1 skipped, 0 failed");
	});

	test("--number and --total are mutually exclusive", async () => {
		const { code, output } = await run(["ingest", "add", "ACME", "-n", "2", "-t", "3"]);

		expect(code).toBe(1);
		expect(output.errors).toEqual([
			"Error: --total and --number are mutually exclusive.",
			"  Hint: Check the command arguments and try again.",
		]);
		expect(opened).toBe(0);
	});

	test("add rejects several tickers", async () => {
		const { code, output } = await run(["ingest", "add", "ACME", "BOLT"]);

		expect(code).toBe(1);
		expect(output.errors.slice(0, 2)).toEqual([
			"Error: ingest add takes exactly one ticker.",
			"  Received 2. Use 'ingest batch' for several tickers.",
		]);
	});

	test("unknown options are reported", async () => {
		const { code, output } = await run(["ingest", "add", "ACME", "--bogus"]);

		expect(code).toBe(1);
		expect(output.errors[0]).toContain("Unknown option '--bogus'");
	});

	test("non-numeric counts are rejected", async () => {
		const { code, output } = await run(["ingest", "add", "ACME", "-n", "two"]);

		expect(code).toBe(1);
		expect(output.errors.slice(0, 2)).toEqual([
			"Error: Invalid value for --number: two",
			"  Expected a whole number.",
		]);
	});

	test("an interrupt cancels the task", async () => {
		const controller = new AbortController();
		controller.abort();

		const { code, output } = await run(["ingest", "add", "ACME"], new RecordingOutput(), {
			signal: controller.signal,
		});

		expect(code).toBe(CANCELLED_EXIT_CODE);
		expect(output.lines.at(-1)).toBe("Cancelled. Filings stored by this task were removed.");
		expect(await services.registry.count()).toBe(0);
	});

	test("a failed task exits non-zero", async () => {
		await services.close();
		await build(false);

		const { code, output } = await run(["ingest", "add", "ACME"]);

		expect(code).toBe(1);
		expect(output.errors[0]).toBe("Error: SEC EDGAR identity is not configured");
	});
});

// ============================================
// search
// ============================================

describe("search", () => {
	test("prints ranked results", async () => {
		await run(["ingest", "add", "ACME", "-f", "10-K"]);

		const { code, output } = await run(["search", "Acme", "Sensors", "-k", "acme", "-n", "2"]);

		expect(code).toBe(0);
		expect(output.lines[0]).toBe("Found 2 result(s)");
		expect(output.lines[1]).toBe("");
		expect(output.lines[2]).toMatch(/^#1 {2}-?\d+\.\d% similarity {2}\| {2}ACME 10-K {2}\| {2}2024-02-20$/);
	});

	test("reports when nothing matches", async () => {
		const { code, output } = await run(["search", "revenue", "-k", "ZZZZ"]);

		expect(code).toBe(0);
		expect(output.lines).toEqual(["No results found."]);
	});

	test("an empty query fails with details and a hint", async () => {
		const { code, output } = await run(["search", "   "]);

		expect(code).toBe(1);
		expect(output.errors).toEqual([
			"Error: Empty search query",
			"  Cannot search with an empty or whitespace-only query.",
			"  Hint: Make sure filings have been ingested.",
		]);
	});
});

// ============================================
// manage
// ============================================

describe("manage", () => {
	test("status on an empty database", async () => {
		const { code, output } = await run(["manage", "status"]);

		expect(code).toBe(0);
		expect(output.lines).toEqual([
			"Database Status",
			"  Filings 0/20",
			"  Chunks  0",
			"  Tickers -",
			"  Forms   -",
		]);
	});

	test("status after an ingest", async () => {
		await run(["ingest", "batch", "ACME", "BOLT", "-f", "10-K"]);

		const { output } = await run(["manage", "status"]);

		expect(output.lines[1]).toBe("  Filings 2/20");
		expect(output.lines[3]).toBe("  Tickers 2 (ACME, BOLT)");
		expect(output.lines[4]).toBe("  Forms   10-K: 2");
	});

	test("list prints a table of filings", async () => {
		await run(["ingest", "add", "ACME", "-f", "10-K"]);

		const { code, output } = await run(["manage", "list", "-k", "acme"]);

		expect(code).toBe(0);
		expect(output.lines).toHaveLength(2);
		expect(output.lines[0]).toMatch(
			/^Ticker {2}Form {2}Filing Date {2}Accession Number {6}Chunks {2}Ingested At$/,
		);
		expect(output.lines[1]).toMatch(/^ACME {4}10-K {2}2024-02-20 {3}0001000001-24-000010 {2}\d+/);
	});

	test("list with no filings", async () => {
		const { output } = await run(["manage", "list"]);

		expect(output.lines).toEqual(["No filings found."]);
	});

	test("remove deletes a filing with --yes", async () => {
		await run(["ingest", "add", "ACME", "-f", "10-K"]);
		const record = await services.registry.getFiling("0001000001-24-000010");

		const { code, output } = await run(["manage", "remove", "0001000001-24-000010", "--yes"]);

		expect(code).toBe(0);
		expect(output.questions).toEqual([]);
		expect(output.lines.at(-1)).toBe(
			`Removed: ACME 10-K (2024-02-20), ${record?.chunkCount} chunks deleted`,
		);
		expect(await services.registry.count()).toBe(0);
	});

	test("remove asks first and keeps the filing when declined", async () => {
		await run(["ingest", "add", "ACME", "-f", "10-K"]);

		const { code, output } = await run(["manage", "remove", "0001000001-24-000010"]);

		expect(code).toBe(0);
		expect(output.questions).toEqual(["Remove this filing?"]);
		expect(output.lines.at(-1)).toBe("Cancelled.");
		expect(await services.registry.count()).toBe(1);
	});

	test("remove of an unknown filing fails", async () => {
		const { code, output } = await run(["manage", "remove", "0000000000-00-000000", "-y"]);

		expect(code).toBe(1);
		expect(output.errors).toEqual([
			"Error: Filing not found: 0000000000-00-000000",
			"  Hint: Run 'sec-search manage list' to see available accession numbers.",
		]);
	});

	test("clear removes everything once confirmed", async () => {
		expect((await run(["manage", "clear", "--yes"])).output.lines).toEqual([
			"Database is already empty.",
		]);

		await run(["ingest", "batch", "ACME", "BOLT", "-f", "10-K"]);

		const declined = await run(["manage", "clear"]);
		expect(declined.output.questions).toEqual(["Remove all 2 filings?"]);
		expect(await services.registry.count()).toBe(2);

		const { code, output } = await run(["manage", "clear"], new RecordingOutput(true));
		expect(code).toBe(0);
		expect(output.lines.at(-1)).toMatch(/^Cleared: 2 filings, \d+ chunks deleted$/);
		expect(await services.registry.count()).toBe(0);
	});

	test("unknown subcommands fail", async () => {
		const { code, output } = await run(["manage", "frob"]);

		expect(code).toBe(1);
		expect(output.errors[0]).toBe("Error: Unknown manage command: frob");
		expect(closed).toBe(1);
	});
});
