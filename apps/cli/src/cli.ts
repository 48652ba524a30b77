/**
 * sec-search command line
 *
 * Dispatches to the ingest, search and manage commands. Services are opened
 * only for commands that need them and closed before returning.
 */

import { loadSettings } from "@secsearch/config";
import { ValidationError } from "@secsearch/domain";
import { createServices, type Services } from "@secsearch/runtime";
import { INGEST_USAGE, parseIngestArgs, runIngest } from "./commands/ingest.js";
import { MANAGE_USAGE, runManage } from "./commands/manage.js";
import { runSearch, SEARCH_USAGE } from "./commands/search.js";
import { log } from "./logger.js";
import { type Output, printError } from "./output.js";

export const CLI_VERSION = "0.1.0";

export const USAGE = `sec-search: semantic search over SEC 10-K and 10-Q filings

Usage:
  ${INGEST_USAGE}

  ${SEARCH_USAGE}

  ${MANAGE_USAGE}

  sec-search --version
  sec-search --help`;

export interface CliDeps {
	openServices?: () => Promise<Services>;
	/** Aborted on Ctrl+C; cancels a running ingest */
	signal?: AbortSignal;
	/** Stream poll interval for ingest progress */
	pollIntervalMs?: number;
}

async function defaultServices(): Promise<Services> {
	return createServices(await loadSettings());
}

function wantsHelp(args: readonly string[]): boolean {
	return args.includes("--help") || args.includes("-h");
}

/**
 * Run one invocation. Returns the process exit code.
 */
export async function runCli(argv: string[], output: Output, deps: CliDeps = {}): Promise<number> {
	const [command, ...rest] = argv;
	const openServices = deps.openServices ?? defaultServices;

	if (command === undefined || command === "--help" || command === "-h") {
		output.write(USAGE);
		return command === undefined ? 1 : 0;
	}
	if (command === "--version" || command === "-v") {
		output.write(`sec-search ${CLI_VERSION}`);
		return 0;
	}

	let services: Services | null = null;
	try {
		switch (command) {
			case "ingest": {
				const [subcommand, ...args] = rest;
				if (wantsHelp(rest)) {
					output.write(`Usage: ${INGEST_USAGE}`);
					return 0;
				}
				if (subcommand !== "add" && subcommand !== "batch") {
					throw new ValidationError(`Unknown ingest command: ${subcommand ?? "(none)"}`, {
						hint: `Usage: ${INGEST_USAGE}`,
					});
				}
				const request = parseIngestArgs(subcommand, args);
				services = await openServices();
				return await runIngest(services, request, output, {
					signal: deps.signal,
					pollIntervalMs: deps.pollIntervalMs,
				});
			}
			case "search":
				if (wantsHelp(rest)) {
					output.write(`Usage: ${SEARCH_USAGE}`);
					return 0;
				}
				services = await openServices();
				return await runSearch(services, rest, output);
			case "manage": {
				if (wantsHelp(rest)) {
					output.write(`Usage: ${MANAGE_USAGE}`);
					return 0;
				}
				const [subcommand, ...args] = rest;
				services = await openServices();
				return await runManage(services, subcommand, args, output);
			}
			default:
				throw new ValidationError(`Unknown command: ${command}`, {
					hint: "Run 'sec-search --help' for usage.",
				});
		}
	} catch (error) {
		log.debug({ command, error: error instanceof Error ? error.stack : String(error) }, "Command failed");
		printError(output, error);
		return 1;
	} finally {
		await services?.close();
	}
}
