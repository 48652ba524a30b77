/**
 * @secsearch/config
 *
 * Settings schema and the layered loader (defaults, YAML, environment).
 */

export {
	CONFIG_PATH_ENV,
	DEFAULT_CONFIG_FILE,
	type EnvSource,
	edgarUserAgent,
	type LoadSettingsOptions,
	loadSettings,
	parseSettings,
	settingsFromEnv,
} from "./loader.js";
export * from "./settings.js";
