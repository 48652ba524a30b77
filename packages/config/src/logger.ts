import { createServiceLogger, type LifecycleLogger } from "@secsearch/logger";

export const log: LifecycleLogger = createServiceLogger("config");
