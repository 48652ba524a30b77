/**
 * manage status | list | remove | clear
 */

import { parseArgs } from "node:util";
import { normalizeFormType, ValidationError } from "@secsearch/domain";
import type { Services } from "@secsearch/runtime";
import { parseOrThrow } from "../args.js";
import { formatTable, type Output, paint } from "../output.js";

export const MANAGE_USAGE = `sec-search manage status
       sec-search manage list [-k TICKER] [-f FORM]
       sec-search manage remove <ACCESSION> [--yes]
       sec-search manage clear [--yes]`;

const LIST_OPTIONS = {
	ticker: { type: "string", short: "k" },
	form: { type: "string", short: "f" },
} as const;

const CONFIRM_OPTIONS = {
	yes: { type: "boolean", short: "y" },
} as const;

// ============================================
// status
// ============================================

async function status(services: Services, output: Output): Promise<number> {
	const { filingCount, maxFilings, chunkCount, tickers, formBreakdown } =
		await services.store.status();

	const forms = Object.entries(formBreakdown)
		.map(([form, count]) => `${form}: ${count}`)
		.join("  |  ");

	const rows: Array<[string, string]> = [
		["Filings", `${filingCount}/${maxFilings}`],
		["Chunks", String(chunkCount)],
		["Tickers", tickers.length > 0 ? `${tickers.length} (${tickers.join(", ")})` : "-"],
		["Forms", forms || "-"],
	];

	output.write(paint(output, "bold", "Database Status"));
	for (const [key, value] of rows) {
		output.write(`  ${paint(output, "bold", key.padEnd(8))}${value}`);
	}
	return 0;
}

// ============================================
// list
// ============================================

async function list(services: Services, args: string[], output: Output): Promise<number> {
	const { values } = parseOrThrow(() => parseArgs({ args, options: LIST_OPTIONS }), MANAGE_USAGE);
	const filings = await services.registry.listFilings({
		ticker: values.ticker,
		formType: values.form === undefined ? undefined : normalizeFormType(values.form),
	});

	if (filings.length === 0) {
		output.write(paint(output, "yellow", "No filings found."));
		return 0;
	}

	const lines = formatTable(
		output,
		["Ticker", "Form", "Filing Date", "Accession Number", "Chunks", "Ingested At"],
		filings.map((filing) => [
			filing.ticker,
			filing.formType,
			filing.filingDate,
			filing.accessionNumber,
			String(filing.chunkCount),
			filing.ingestedAt,
		]),
	);
	for (const line of lines) {
		output.write(line);
	}
	return 0;
}

// ============================================
// remove / clear
// ============================================

async function remove(services: Services, args: string[], output: Output): Promise<number> {
	const { values, positionals } = parseOrThrow(
		() => parseArgs({ args, options: CONFIRM_OPTIONS, allowPositionals: true }),
		MANAGE_USAGE,
	);
	const [accession] = positionals;
	if (accession === undefined || positionals.length > 1) {
		throw new ValidationError("manage remove takes exactly one accession number.");
	}

	const filing = await services.registry.getFiling(accession);
	if (!filing) {
		throw new ValidationError(`Filing not found: ${accession}`, {
			hint: "Run 'sec-search manage list' to see available accession numbers.",
		});
	}

	output.write(
		`${paint(output, "cyan", `${filing.ticker} ${filing.formType}`)} ${filing.filingDate}  ` +
			`${filing.chunkCount} chunks  ${paint(output, "dim", filing.accessionNumber)}`,
	);
	if (!values.yes && !(await output.confirm("Remove this filing?"))) {
		output.write("Cancelled.");
		return 0;
	}

	const { chunksDeleted } = await services.store.deleteFiling(accession);
	output.write(
		`${paint(output, "green", "Removed:")} ${filing.ticker} ${filing.formType} ` +
			`(${filing.filingDate}), ${chunksDeleted} chunks deleted`,
	);
	return 0;
}

async function clear(services: Services, args: string[], output: Output): Promise<number> {
	const { values } = parseOrThrow(() => parseArgs({ args, options: CONFIRM_OPTIONS }), MANAGE_USAGE);

	const count = await services.registry.count();
	if (count === 0) {
		output.write("Database is already empty.");
		return 0;
	}
	if (!values.yes && !(await output.confirm(`Remove all ${count} filings?`))) {
		output.write("Cancelled.");
		return 0;
	}

	const { filingsDeleted, chunksDeleted } = await services.store.clearAll();
	output.write(
		`${paint(output, "green", "Cleared:")} ${filingsDeleted} filings, ${chunksDeleted} chunks deleted`,
	);
	return 0;
}

export async function runManage(
	services: Services,
	subcommand: string | undefined,
	args: string[],
	output: Output,
): Promise<number> {
	switch (subcommand) {
		case "status":
			return status(services, output);
		case "list":
			return list(services, args, output);
		case "remove":
			return remove(services, args, output);
		case "clear":
			return clear(services, args, output);
		default:
			throw new ValidationError(`Unknown manage command: ${subcommand ?? "(none)"}`, {
				hint: `Usage: ${MANAGE_USAGE}`,
			});
	}
}
