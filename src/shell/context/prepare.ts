// CHANGE: Explicit "prepare context" step (directory + isolated environment)
// WHY: directory and environment failures surface before the lint step, never as a tool status
// REF: venv activate script (bin first on PATH, VIRTUAL_ENV set, PYTHONHOME unset)
// PURITY: SHELL (filesystem checks)
// EFFECT: Effect<ExecutionContext, DirectoryUnavailable | EnvironmentUnavailable>
// INVARIANT: process.cwd() and process.env are never mutated
// COMPLEXITY: O(1) fs checks; O(k) environment copy

import * as fs from "node:fs";

import { Effect } from "effect";

import { activateEnvironment, type RawEnv } from "../../core/environment.js";
import {
	DirectoryUnavailable,
	EnvironmentUnavailable,
} from "../../core/errors.js";
import type { ExecutionContext } from "../../core/models.js";
import type { LintGateConfig } from "../../core/types/config.js";

/**
 * Host facts the context is derived from.
 */
export interface PrepareOptions {
	readonly env?: RawEnv;
	readonly platform?: NodeJS.Platform;
}

type DirectoryState = "ok" | "missing" | "notDirectory" | "inaccessible";

/**
 * Classifies a path without throwing.
 *
 * @pure false (reads filesystem)
 */
export function inspectDirectory(dir: string): DirectoryState {
	let stat: fs.Stats;
	try {
		stat = fs.statSync(dir);
	} catch (error) {
		const code =
			error instanceof Error && "code" in error ? error.code : undefined;
		return code === "ENOENT" || code === "ENOTDIR" ? "missing" : "inaccessible";
	}
	if (!stat.isDirectory()) return "notDirectory";
	try {
		// entering a directory needs search permission
		fs.accessSync(dir, fs.constants.X_OK);
		return "ok";
	} catch {
		return "inaccessible";
	}
}

/**
 * Verifies the project directory.
 */
export function checkProjectDirectory(
	dir: string,
): Effect.Effect<string, DirectoryUnavailable> {
	return Effect.suspend(() => {
		const state = inspectDirectory(dir);
		return state === "ok"
			? Effect.succeed(dir)
			: Effect.fail(new DirectoryUnavailable({ path: dir, reason: state }));
	});
}

/**
 * Activates the isolated environment into a fresh environment map.
 *
 * @postcondition result.binDir exists and is a directory
 */
export function activateIsolatedEnvironment(
	envDir: string,
	options: PrepareOptions = {},
): Effect.Effect<
	{ readonly env: Readonly<Record<string, string>>; readonly binDir: string },
	EnvironmentUnavailable
> {
	return Effect.suspend(() => {
		if (inspectDirectory(envDir) !== "ok") {
			return Effect.fail(
				new EnvironmentUnavailable({ envDir, reason: "missing" }),
			);
		}
		const activated = activateEnvironment(
			options.env ?? process.env,
			envDir,
			options.platform ?? process.platform,
		);
		if (inspectDirectory(activated.binDir) !== "ok") {
			return Effect.fail(
				new EnvironmentUnavailable({ envDir, reason: "noBinDir" }),
			);
		}
		return Effect.succeed(activated);
	});
}

/**
 * Builds the scoped execution context for one run.
 *
 * Directory first, environment second: the environment is never inspected
 * when the directory is unavailable.
 *
 * @example
 * ```ts
 * const ctx = await Effect.runPromise(prepareContext(config));
 * // ctx.cwd === config.projectDir, ctx.env.VIRTUAL_ENV === config.envDir
 * ```
 */
export function prepareContext(
	config: LintGateConfig,
	options: PrepareOptions = {},
): Effect.Effect<ExecutionContext, DirectoryUnavailable | EnvironmentUnavailable> {
	return Effect.gen(function* () {
		const cwd = yield* checkProjectDirectory(config.projectDir);
		const { env, binDir } = yield* activateIsolatedEnvironment(
			config.envDir,
			options,
		);
		return { cwd, env, envDir: config.envDir, binDir };
	});
}
