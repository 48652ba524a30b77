/**
 * sec-search entry point.
 */

import { runCli } from "./cli.js";
import { log } from "./logger.js";
import { consoleOutput } from "./output.js";

const interrupt = new AbortController();
process.once("SIGINT", () => interrupt.abort());

process.exitCode = await runCli(process.argv.slice(2), consoleOutput(), {
	signal: interrupt.signal,
});
await log.flush();
