/**
 * Dashboard API Logger
 */

import { createServiceLogger, type LifecycleLogger } from "@secsearch/logger";

export const log: LifecycleLogger = createServiceLogger("dashboard-api");

export default log;
