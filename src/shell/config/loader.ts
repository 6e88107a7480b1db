// CHANGE: Configuration loading for the runner (lint-gate.config.json + environment)
// WHY: runner settings are configuration, not CLI flags
// REF: JSON.parse type guards, no `as` casts on parsed input
// PURITY: SHELL (reads filesystem and environment)
// EFFECT: Effect<LintGateConfig, ConfigError>
// INVARIANT: returned paths are absolute; envDir is resolved against projectDir
// COMPLEXITY: O(n) where n = size of the config file

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { RawEnv } from "../../core/environment.js";
import {
	DEFAULT_CONFIG,
	DEFAULT_CONFIG_FILE,
	type LintGateConfig,
	type LintGateConfigInput,
} from "../../core/types/config.js";

export const CONFIG_PATH_ENV = "LINT_GATE_CONFIG";
export const VERBOSE_ENV = "LINT_GATE_VERBOSE";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
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

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

// spawn rejects NUL bytes in the command and its arguments
function isArgString(value: JSONValue): value is string {
	return isString(value) && !value.includes("\0");
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((item) => isArgString(item));
}

/**
 * Where configuration is looked up.
 *
 * @property cwd Directory the runner was started from
 * @property env Environment consulted for LINT_GATE_* overrides
 */
export interface LoadConfigOptions {
	readonly cwd?: string;
	readonly env?: RawEnv;
}

/**
 * Validates one optional field; `undefined` when absent.
 */
function readField<T extends JSONValue>(
	obj: JSONObject,
	key: keyof LintGateConfigInput,
	guard: (value: JSONValue) => value is T,
	expected: string,
	file: string,
): Effect.Effect<T | undefined, ConfigError> {
	const value = obj[key];
	if (value === undefined) return Effect.succeed(undefined);
	if (guard(value)) return Effect.succeed(value);
	return Effect.fail(
		new ConfigError({
			path: file,
			detail: `"${key}" must be ${expected}`,
		}),
	);
}

const isNonEmptyString = (value: JSONValue): value is string =>
	isArgString(value) && value.trim().length > 0;

const isBoolean = (value: JSONValue): value is boolean =>
	typeof value === "boolean";

/**
 * Parses and validates the contents of a config file.
 *
 * Unknown keys are ignored.
 *
 * @param raw File contents
 * @param file Path used in error messages
 */
export function parseConfigInput(
	raw: string,
	file: string,
): Effect.Effect<LintGateConfigInput, ConfigError> {
	return Effect.gen(function* () {
		const parsed = yield* Effect.try({
			try: (): JSONValue => JSON.parse(raw),
			catch: (error) =>
				new ConfigError({
					path: file,
					detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});
		if (!isJSONObject(parsed)) {
			return yield* Effect.fail(
				new ConfigError({ path: file, detail: "top level must be an object" }),
			);
		}

		const projectDir = yield* readField(
			parsed,
			"projectDir",
			isNonEmptyString,
			"a non-empty string without NUL characters",
			file,
		);
		const envDir = yield* readField(
			parsed,
			"envDir",
			isNonEmptyString,
			"a non-empty string without NUL characters",
			file,
		);
		const tool = yield* readField(
			parsed,
			"tool",
			isNonEmptyString,
			"a non-empty string without NUL characters",
			file,
		);
		const args = yield* readField(
			parsed,
			"args",
			isStringArray,
			"an array of strings without NUL characters",
			file,
		);
		const verbose = yield* readField(
			parsed,
			"verbose",
			isBoolean,
			"a boolean",
			file,
		);

		// exactOptionalPropertyTypes: absent keys stay absent
		return {
			...(projectDir === undefined ? {} : { projectDir }),
			...(envDir === undefined ? {} : { envDir }),
			...(tool === undefined ? {} : { tool }),
			...(args === undefined ? {} : { args }),
			...(verbose === undefined ? {} : { verbose }),
		};
	});
}

/**
 * Truthy spellings accepted for boolean environment switches.
 */
export function isEnvFlagSet(value: string | undefined): boolean {
	if (value === undefined) return false;
	return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

/**
 * Applies defaults and resolves paths.
 *
 * @param input Validated file contents
 * @param baseDir Directory relative projectDir values are resolved against
 *
 * @pure true
 * @postcondition path.isAbsolute(result.projectDir) ∧ path.isAbsolute(result.envDir)
 */
export function resolveConfig(
	input: LintGateConfigInput,
	baseDir: string,
	forceVerbose = false,
): LintGateConfig {
	const merged = { ...DEFAULT_CONFIG, ...input };
	const projectDir = path.resolve(baseDir, merged.projectDir);
	return {
		projectDir,
		envDir: path.resolve(projectDir, merged.envDir),
		tool: merged.tool,
		args: [...merged.args],
		verbose: merged.verbose || forceVerbose,
	};
}

/**
 * Loads runner configuration.
 *
 * Lookup: `$LINT_GATE_CONFIG` (must exist) or `<cwd>/lint-gate.config.json`
 * (optional). Without a file, the built-in defaults apply relative to cwd.
 *
 * @example
 * ```ts
 * const config = await Effect.runPromise(loadConfig({ cwd: "/srv/app" }));
 * // config.projectDir === "/srv/app/BackendService"
 * ```
 */
export function loadConfig(
	options: LoadConfigOptions = {},
): Effect.Effect<LintGateConfig, ConfigError> {
	const cwd = options.cwd ?? process.cwd();
	const env = options.env ?? process.env;
	const explicit = env[CONFIG_PATH_ENV];
	const hasExplicit = explicit !== undefined && explicit.length > 0;
	const file = hasExplicit
		? path.resolve(cwd, explicit)
		: path.join(cwd, DEFAULT_CONFIG_FILE);
	const forceVerbose = isEnvFlagSet(env[VERBOSE_ENV]);

	return Effect.gen(function* () {
		if (!fs.existsSync(file)) {
			if (hasExplicit) {
				return yield* Effect.fail(
					new ConfigError({ path: file, detail: "file not found" }),
				);
			}
			return resolveConfig({}, cwd, forceVerbose);
		}

		const raw = yield* Effect.try({
			try: () => fs.readFileSync(file, "utf8"),
			catch: (error) =>
				new ConfigError({
					path: file,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		const input = yield* parseConfigInput(raw, file);
		return resolveConfig(input, path.dirname(file), forceVerbose);
	});
}
