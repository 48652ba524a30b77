/**
 * Supported SEC form types and form-list parsing.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";

export const SUPPORTED_FORMS = ["10-K", "10-Q"] as const;

export const FormTypeSchema = z.enum(SUPPORTED_FORMS);
export type FormType = z.infer<typeof FormTypeSchema>;

const SUPPORTED_LIST = SUPPORTED_FORMS.join(", ");

export function isFormType(value: string): value is FormType {
	return FormTypeSchema.safeParse(value).success;
}

/**
 * Normalise a single form type ("10-q " -> "10-Q").
 */
export function normalizeFormType(value: string): FormType {
	const normalized = value.trim().toUpperCase();
	if (!isFormType(normalized)) {
		throw new ValidationError(`Unsupported form type(s): ${normalized}. Supported: ${SUPPORTED_LIST}`);
	}
	return normalized;
}

/**
 * Parse a comma-separated form list into a sorted, de-duplicated array.
 *
 * @example
 * parseFormTypes("10-q, 10-K,10-Q") // ["10-K", "10-Q"]
 */
export function parseFormTypes(input: string | readonly string[]): FormType[] {
	const parts = (typeof input === "string" ? input.split(",") : input)
		.map((part) => part.trim().toUpperCase())
		.filter((part) => part.length > 0);

	if (parts.length === 0) {
		throw new ValidationError(`Empty form type. Supported: ${SUPPORTED_LIST}`);
	}

	const unsupported = [...new Set(parts.filter((part) => !isFormType(part)))];
	if (unsupported.length > 0) {
		throw new ValidationError(
			`Unsupported form type(s): ${unsupported.join(", ")}. Supported: ${SUPPORTED_LIST}`,
		);
	}

	return [...new Set(parts.filter(isFormType))].sort();
}
