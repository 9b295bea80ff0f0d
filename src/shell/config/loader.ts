// PURITY: SHELL (reads configuration file and environment)
// EFFECT: Effect<ToolConfig, ConfigError>
// INVARIANT: precedence defaults < include-cleaner.config.json < environment; built-in tables always come first
// COMPLEXITY: O(n) where n = config file size

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { IncludeMapping, ToolConfig } from "../../core/models.js";
import {
	CONFIG_FILE_NAME,
	DEFAULT_CLEANER_BINARY,
	DEFAULT_COMPDB_SCRIPT,
	DEFAULT_GN_BINARY,
	DEFAULT_WORK_DIR,
	EXTRA_ARGS,
	IGNORED_HEADERS,
	INCLUDE_MAPPINGS,
} from "../../core/tables.js";

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

function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return (
		value !== undefined &&
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

function stringField(obj: JSONObject, key: string): string | undefined {
	const value = obj[key];
	return typeof value === "string" && value.length > 0 ? value : undefined;
}

function stringListField(obj: JSONObject, key: string): ReadonlyArray<string> {
	const value = obj[key];
	if (!Array.isArray(value)) return [];
	return value.filter((v): v is string => typeof v === "string");
}

function mappingsField(obj: JSONObject): ReadonlyArray<IncludeMapping> {
	const value = obj["includeMappings"];
	if (!isJSONObject(value)) return [];
	const mappings: IncludeMapping[] = [];
	for (const [from, to] of Object.entries(value)) {
		if (from.length > 0 && typeof to === "string") {
			mappings.push({ from, to });
		}
	}
	return mappings;
}

/**
 * Tool locations before any file or environment override.
 * `DEPOT_TOOLS_PATH` points GN at depot_tools' `gn.py` wrapper.
 *
 * @pure true
 */
export function defaultToolConfig(env: NodeJS.ProcessEnv): ToolConfig {
	const depotTools = env["DEPOT_TOOLS_PATH"];
	return {
		cleanerBinary: DEFAULT_CLEANER_BINARY,
		gnBinary:
			depotTools !== undefined && depotTools.length > 0
				? path.join(depotTools, "gn.py")
				: DEFAULT_GN_BINARY,
		compdbScript: DEFAULT_COMPDB_SCRIPT,
		defaultWorkDir: DEFAULT_WORK_DIR,
		includeMappings: INCLUDE_MAPPINGS,
		ignoredHeaders: IGNORED_HEADERS,
		extraArgs: EXTRA_ARGS,
	};
}

/**
 * Merge a parsed configuration document over the defaults. Entries with the
 * wrong type are ignored one by one; list entries are appended.
 *
 * @pure true
 */
export function mergeToolConfig(base: ToolConfig, raw: JSONValue): ToolConfig {
	if (!isJSONObject(raw)) return base;
	return {
		cleanerBinary: stringField(raw, "cleanerBinary") ?? base.cleanerBinary,
		gnBinary: stringField(raw, "gnBinary") ?? base.gnBinary,
		compdbScript: stringField(raw, "compdbScript") ?? base.compdbScript,
		defaultWorkDir: stringField(raw, "defaultWorkDir") ?? base.defaultWorkDir,
		includeMappings: [...base.includeMappings, ...mappingsField(raw)],
		ignoredHeaders: [
			...base.ignoredHeaders,
			...stringListField(raw, "ignoredHeaders"),
		],
		extraArgs: [...base.extraArgs, ...stringListField(raw, "extraArgs")],
	};
}

function applyEnv(config: ToolConfig, env: NodeJS.ProcessEnv): ToolConfig {
	const cleaner = env["INCLUDE_CLEANER_BINARY"];
	const gn = env["INCLUDE_CLEANER_GN"];
	return {
		...config,
		cleanerBinary:
			cleaner !== undefined && cleaner.length > 0
				? cleaner
				: config.cleanerBinary,
		gnBinary: gn !== undefined && gn.length > 0 ? gn : config.gnBinary,
	};
}

function freeze(config: ToolConfig): ToolConfig {
	return Object.freeze({
		...config,
		includeMappings: Object.freeze([...config.includeMappings]),
		ignoredHeaders: Object.freeze([...config.ignoredHeaders]),
		extraArgs: Object.freeze([...config.extraArgs]),
	});
}

function readConfigFile(
	configPath: string,
): Effect.Effect<JSONValue | null, ConfigError> {
	return Effect.try({
		try: (): JSONValue | null => {
			if (!fs.existsSync(configPath)) return null;
			const parsed: JSONValue = JSON.parse(fs.readFileSync(configPath, "utf8"));
			return parsed;
		},
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: error instanceof Error ? error.message : String(error),
			}),
	});
}

/**
 * Load the tool configuration for a run.
 *
 * @param cwd - Directory searched for include-cleaner.config.json
 * @param env - Process environment
 * @returns Frozen ToolConfig or ConfigError when the file exists but is unreadable / not JSON
 *
 * @pure false (filesystem)
 * @effect Effect<ToolConfig, ConfigError>
 */
export function loadToolConfig(
	cwd: string,
	env: NodeJS.ProcessEnv,
): Effect.Effect<ToolConfig, ConfigError> {
	return Effect.gen(function* () {
		const raw = yield* readConfigFile(path.join(cwd, CONFIG_FILE_NAME));
		const base = defaultToolConfig(env);
		const merged = raw === null ? base : mergeToolConfig(base, raw);
		return freeze(applyEnv(merged, env));
	});
}
