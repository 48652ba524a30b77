/**
 * search <query>
 */

import { parseArgs } from "node:util";
import { normalizeFormType } from "@secsearch/domain";
import type { Services } from "@secsearch/runtime";
import { parseInteger, parseNumber, parseOrThrow } from "../args.js";
import { type Output, paint } from "../output.js";

/** Characters of chunk content shown per result */
export const CONTENT_PREVIEW_LIMIT = 500;

export const SEARCH_USAGE = `sec-search search <QUERY> [options]

Options:
  -k, --ticker <ticker>          Only this company
  -f, --form <form>              Only this form type (10-K or 10-Q)
  -n, --top <n>                  Number of results
  -m, --min-similarity <0..1>    Drop results below this similarity
  -a, --accession <number>       Only this filing`;

const SEARCH_OPTIONS = {
	ticker: { type: "string", short: "k" },
	form: { type: "string", short: "f" },
	top: { type: "string", short: "n" },
	"min-similarity": { type: "string", short: "m" },
	accession: { type: "string", short: "a" },
	help: { type: "boolean", short: "h" },
} as const;

export function formatSimilarity(similarity: number): string {
	return `${(similarity * 100).toFixed(1)}%`;
}

export function preview(content: string, limit: number = CONTENT_PREVIEW_LIMIT): string {
	return content.length > limit ? `${content.slice(0, limit)}...` : content;
}

export async function runSearch(services: Services, args: string[], output: Output): Promise<number> {
	const { values, positionals } = parseOrThrow(
		() => parseArgs({ args, options: SEARCH_OPTIONS, allowPositionals: true }),
		SEARCH_USAGE,
	);

	const results = await services.search.search(positionals.join(" "), {
		topK: parseInteger(values.top, "--top"),
		ticker: values.ticker?.toUpperCase(),
		formType: values.form === undefined ? undefined : normalizeFormType(values.form),
		minSimilarity: parseNumber(values["min-similarity"], "--min-similarity"),
		accessionNumber: values.accession,
	});

	if (results.length === 0) {
		output.write(paint(output, "yellow", "No results found."));
		return 0;
	}

	output.write(paint(output, "bold", `Found ${results.length} result(s)`));
	results.forEach((result, index) => {
		output.write();
		output.write(
			`${paint(output, "bold", `#${index + 1}`)}  ${paint(output, "cyan", formatSimilarity(result.similarity))} similarity  |  ` +
				`${result.ticker} ${result.formType}  |  ${result.filingDate}`,
		);
		output.write(paint(output, "dim", result.path));
		output.write(preview(result.content));
	});
	return 0;
}
