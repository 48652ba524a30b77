import type { Services } from "@secsearch/runtime";

/**
 * Dependencies shared by every route, built once per process.
 */
export interface AppContext {
	services: Services;
	version: string;
}
