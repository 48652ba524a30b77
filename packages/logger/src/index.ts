import pino from "pino";

export type { Logger } from "pino";

export {
	createNodeLogger,
	createServiceLogger,
	isLogLevel,
	type LifecycleLogger,
	resolveLogLevel,
} from "./node.js";
export * from "./redaction.js";
export * from "./types.js";

export { pino };
