/**
 * Configuration Loader
 *
 * Precedence (highest to lowest):
 * 1. Environment variables (see ENV_BINDINGS)
 * 2. YAML file (SEC_SEARCH_CONFIG, or ./sec-search.yaml when present)
 * 3. DEFAULT_SETTINGS
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigurationError } from "@secsearch/domain";
import { deepmergeCustom } from "deepmerge-ts";
import { parse } from "yaml";
import { z } from "zod";
import { log } from "./logger.js";
import { DEFAULT_SETTINGS, ENV_BINDINGS, type Settings, SettingsSchema } from "./settings.js";

export const CONFIG_PATH_ENV = "SEC_SEARCH_CONFIG";
export const DEFAULT_CONFIG_FILE = "sec-search.yaml";

export type EnvSource = Record<string, string | undefined>;

export interface LoadSettingsOptions {
	/** Defaults to process.env */
	env?: EnvSource;
	/** Explicit YAML path; must exist when given */
	configPath?: string;
	/** Directory searched for sec-search.yaml. Defaults to process.cwd() */
	cwd?: string;
}

// Lists from a later layer replace earlier ones
const mergeLayers = deepmergeCustom({ mergeArrays: false });

const YamlDocumentSchema = z.record(z.string(), z.unknown());

/**
 * Load and parse a YAML file
 *
 * @throws ConfigurationError if the file cannot be read or is not a mapping
 */
async function loadYaml(path: string): Promise<Record<string, unknown>> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		throw new ConfigurationError(`Failed to load YAML from ${path}`, {
			details: error instanceof Error ? error.message : String(error),
			cause: error,
		});
	}

	let document: unknown;
	try {
		document = parse(content);
	} catch (error) {
		throw new ConfigurationError(`Invalid YAML in ${path}`, {
			details: error instanceof Error ? error.message : String(error),
			cause: error,
		});
	}

	if (document === null || document === undefined) {
		return {};
	}
	const result = YamlDocumentSchema.safeParse(document);
	if (!result.success) {
		throw new ConfigurationError(`Invalid YAML in ${path}`, {
			details: "The top level must be a mapping of sections.",
		});
	}
	return result.data;
}

/**
 * Collect overrides from environment variables into a nested object.
 * Empty values are ignored.
 */
export function settingsFromEnv(env: EnvSource): Record<string, Record<string, unknown>> {
	const overrides: Record<string, Record<string, unknown>> = {};

	for (const [name, binding] of Object.entries(ENV_BINDINGS)) {
		const raw = env[name]?.trim();
		if (raw === undefined || raw === "") {
			continue;
		}
		const value = binding.list
			? raw
					.split(",")
					.map((item) => item.trim())
					.filter((item) => item.length > 0)
			: raw;
		const section = overrides[binding.section] ?? {};
		section[binding.key] = value;
		overrides[binding.section] = section;
	}

	return overrides;
}

/**
 * Validate merged layers.
 *
 * @throws ConfigurationError naming every invalid key
 */
export function parseSettings(raw: unknown): Settings {
	const result = SettingsSchema.safeParse(raw);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigurationError("Invalid configuration", { details, cause: result.error });
	}
	return result.data;
}

function resolveConfigPath(options: LoadSettingsOptions, env: EnvSource): string | null {
	const explicit = options.configPath ?? env[CONFIG_PATH_ENV];
	if (explicit) {
		return explicit;
	}
	const candidate = resolve(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
	return existsSync(candidate) ? candidate : null;
}

/**
 * Load settings from defaults, the optional YAML file and the environment.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
	const env = options.env ?? process.env;
	const configPath = resolveConfigPath(options, env);

	const fileLayer = configPath ? await loadYaml(configPath) : {};
	if (configPath) {
		log.debug({ configPath }, "Loaded configuration file");
	}

	const merged = mergeLayers(DEFAULT_SETTINGS, fileLayer, settingsFromEnv(env));
	return parseSettings(merged);
}

/**
 * SEC EDGAR requires a User-Agent naming the requester.
 *
 * @throws ConfigurationError when the identity is not configured
 */
export function edgarUserAgent(settings: Settings): string {
	const { identityName, identityEmail } = settings.edgar;
	if (!identityName.trim() || !identityEmail.trim()) {
		throw new ConfigurationError("SEC EDGAR identity is not configured", {
			details: "Set EDGAR_IDENTITY_NAME and EDGAR_IDENTITY_EMAIL.",
		});
	}
	return `${identityName.trim()} ${identityEmail.trim()}`;
}
