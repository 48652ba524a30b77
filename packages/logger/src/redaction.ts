/**
 * Paths censored in every log record.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"apiKey",
	"*.apiKey",
	"password",
	"*.password",
	"authorization",
	"*.authorization",
	"headers.authorization",
	"req.headers.authorization",
	"config.embedding.apiKey",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}
