// PURITY: SHELL (reads the config file)
// INVARIANT: every field falls back to DEFAULT_CONFIG independently
// COMPLEXITY: O(n) where n = size of the config file

import {
	DEFAULT_CONFIG,
	type InstallerConfig,
} from "../../core/types/config.js";
import { fs, path } from "../utils/node-mods.js";

const CONFIG_FILE_NAME = "timelord.config.json";
const CONFIG_ENV_VAR = "TIMELORD_CONFIG";

/**
 * Type representing any valid JSON value.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Reads a non-empty string field, falling back when absent or mistyped.
 */
function stringField(
	source: JSONObject,
	key: keyof InstallerConfig,
	fallback: string,
): string {
	const value = source[key];
	return typeof value === "string" && value.trim().length > 0
		? value
		: fallback;
}

/**
 * Merges a parsed JSON document over the defaults.
 *
 * @pure true
 * @invariant non-object input → DEFAULT_CONFIG
 */
export function normalizeConfig(value: JSONValue): InstallerConfig {
	if (!isJSONObject(value)) {
		return DEFAULT_CONFIG;
	}
	return {
		packageName: stringField(value, "packageName", DEFAULT_CONFIG.packageName),
		venvDir: stringField(value, "venvDir", DEFAULT_CONFIG.venvDir),
		poetryPath: stringField(value, "poetryPath", DEFAULT_CONFIG.poetryPath),
		clientBinary: stringField(value, "clientBinary", DEFAULT_CONFIG.clientBinary),
		benchBinary: stringField(value, "benchBinary", DEFAULT_CONFIG.benchBinary),
		boostFormula: stringField(value, "boostFormula", DEFAULT_CONFIG.boostFormula),
		brewPrefix: stringField(value, "brewPrefix", DEFAULT_CONFIG.brewPrefix),
	};
}

/**
 * Resolves the config file location: $TIMELORD_CONFIG, else ./timelord.config.json.
 */
export function resolveConfigPath(
	cwd: string,
	env: Readonly<Record<string, string | undefined>>,
): string {
	const fromEnv = env[CONFIG_ENV_VAR];
	if (fromEnv !== undefined && fromEnv.length > 0) {
		return path.resolve(cwd, fromEnv);
	}
	return path.join(cwd, CONFIG_FILE_NAME);
}

/**
 * Loads the installer configuration.
 *
 * @returns merged configuration; DEFAULT_CONFIG when the file is missing or not valid JSON
 */
export function loadInstallerConfig(
	cwd: string = process.cwd(),
	env: Readonly<Record<string, string | undefined>> = process.env,
): InstallerConfig {
	const configPath = resolveConfigPath(cwd, env);
	try {
		const raw = fs.readFileSync(configPath, "utf8");
		const parsed = JSON.parse(raw) as JSONValue;
		return normalizeConfig(parsed);
	} catch {
		return DEFAULT_CONFIG;
	}
}
