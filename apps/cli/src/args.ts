/**
 * Argument parsing helpers over node:util parseArgs.
 */

import { errorMessage, ValidationError } from "@secsearch/domain";

/**
 * Run a parseArgs call, reporting its failures as validation errors.
 */
export function parseOrThrow<T>(parse: () => T, usage: string): T {
	try {
		return parse();
	} catch (error) {
		throw new ValidationError(errorMessage(error), { hint: `Usage: ${usage}` });
	}
}

export function parseInteger(value: string | undefined, flag: string): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	if (!Number.isInteger(parsed)) {
		throw new ValidationError(`Invalid value for ${flag}: ${value}`, {
			details: "Expected a whole number.",
		});
	}
	return parsed;
}

export function parseNumber(value: string | undefined, flag: string): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	if (value.trim() === "" || Number.isNaN(parsed)) {
		throw new ValidationError(`Invalid value for ${flag}: ${value}`, {
			details: "Expected a number.",
		});
	}
	return parsed;
}
