/**
 * Terminal Output
 *
 * Everything the CLI prints goes through an Output so commands can be run
 * against a recording sink in tests.
 */

import { createInterface } from "node:readline/promises";
import { styleText } from "node:util";
import { isSecSearchError } from "@secsearch/domain";

export type Style = Parameters<typeof styleText>[0];

export interface Output {
	/** Apply ANSI styles */
	readonly color: boolean;
	write(line?: string): void;
	error(line?: string): void;
	/** Ask a yes/no question; false when declined */
	confirm(question: string): Promise<boolean>;
}

export function paint(output: Output, style: Style, text: string): string {
	return output.color ? styleText(style, text) : text;
}

export function consoleOutput(): Output {
	return {
		color: Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined,
		write: (line = "") => console.log(line),
		error: (line = "") => console.error(line),
		async confirm(question) {
			const rl = createInterface({ input: process.stdin, output: process.stdout });
			try {
				const answer = await rl.question(`${question} [y/N] `);
				return /^y(es)?$/i.test(answer.trim());
			} finally {
				rl.close();
			}
		},
	};
}

/**
 * `Error: <message>`, then details and the remediation hint when known.
 */
export function printError(output: Output, error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	output.error(`${paint(output, "red", "Error:")} ${message}`);

	if (isSecSearchError(error)) {
		if (error.details) {
			output.error(`  ${paint(output, "dim", error.details)}`);
		}
		output.error(`  ${paint(output, "italic", `Hint: ${error.hint}`)}`);
	}
}

/**
 * Left-aligned columns separated by two spaces; the header row is bold.
 */
export function formatTable(output: Output, header: string[], rows: string[][]): string[] {
	const widths = header.map((title, column) =>
		Math.max(title.length, ...rows.map((row) => (row[column] ?? "").length)),
	);
	const line = (cells: string[]) =>
		cells
			.map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
			.join("  ")
			.trimEnd();

	return [paint(output, "bold", line(header)), ...rows.map(line)];
}
