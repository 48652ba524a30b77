import type { DestinationStream, LoggerOptions } from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface NodeLoggerOptions {
	/** Service name attached to every record */
	service: string;
	level?: LogLevel;
	environment?: string;
	version?: string;
	/** Human-readable single-line output via pino-pretty. Defaults to NODE_ENV=development */
	pretty?: boolean;
	/** Extra paths to censor, merged with the defaults */
	redactPaths?: string[];
	base?: Record<string, unknown>;
	pinoOptions?: Partial<LoggerOptions>;
	/** Write JSON records here instead of stdout (ignored when pretty) */
	destination?: DestinationStream;
}
