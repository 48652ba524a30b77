/**
 * CLI Logger
 *
 * Diagnostics only. User-facing output goes through Output.
 */

import { createServiceLogger, type LifecycleLogger } from "@secsearch/logger";

export const log: LifecycleLogger = createServiceLogger("cli");

export default log;
