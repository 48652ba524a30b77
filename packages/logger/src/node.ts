import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import { LOG_LEVELS, type LogLevel, type NodeLoggerOptions } from "./types.js";

export interface LifecycleLogger extends Logger {
	flush(): Promise<void>;
	destroy(): Promise<void>;
}

function wrapLoggerWithLifecycle(baseLogger: Logger): LifecycleLogger {
	let destroyed = false;
	let flushPromise: Promise<void> | null = null;
	const pinoFlush = baseLogger.flush.bind(baseLogger);

	const flush = (): Promise<void> => {
		if (destroyed) {
			return Promise.resolve();
		}
		if (flushPromise) {
			return flushPromise;
		}
		flushPromise = new Promise<void>((resolve) => {
			pinoFlush(() => {
				flushPromise = null;
				resolve();
			});
		});
		return flushPromise;
	};

	const destroy = async (): Promise<void> => {
		if (destroyed) {
			return;
		}
		await flush();
		destroyed = true;
		// Records written after destroy are dropped
		baseLogger.level = "silent";
	};

	return Object.assign(baseLogger, { flush, destroy });
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read a level from an environment value, falling back when unset or unknown.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
	const normalized = value?.trim().toLowerCase();
	return normalized && isLogLevel(normalized) ? normalized : fallback;
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
	const {
		service,
		level = "info",
		environment = process.env.NODE_ENV ?? "development",
		version,
		pretty,
		redactPaths,
		base = {},
		pinoOptions = {},
		destination,
	} = options;

	const isPretty = pretty ?? process.env.NODE_ENV === "development";

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
			bindings: () => ({}), // Remove pid, hostname
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	let baseLogger: Logger;

	if (isPretty) {
		baseLogger = pino(
			loggerOptions,
			pino.transport({
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:HH:MM:ss",
					ignore: "pid,hostname,environment,version",
					messageFormat: "[{service}] {msg}",
					customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
					singleLine: true,
				},
			}),
		);
	} else {
		baseLogger = destination ? pino(loggerOptions, destination) : pino(loggerOptions);
	}

	return wrapLoggerWithLifecycle(baseLogger);
}

/**
 * Package-level logger configured from LOG_LEVEL, LOG_PRETTY and NODE_ENV.
 */
export function createServiceLogger(service: string): LifecycleLogger {
	const prettyEnv = process.env.LOG_PRETTY;
	return createNodeLogger({
		service,
		level: resolveLogLevel(process.env.LOG_LEVEL),
		pretty: prettyEnv === undefined ? undefined : prettyEnv === "true" || prettyEnv === "1",
	});
}
