// CHANGE: Pure derivation of an activated environment map
// WHY: activation is scoped to the child process instead of mutating process.env
// REF: venv activate script
// PURITY: CORE (node:path is used only for string manipulation)
// INVARIANT: input environment is never mutated; result is a fresh object
// COMPLEXITY: O(k) where k = number of environment variables

import * as path from "node:path";

/**
 * Environment as handed out by `process.env`.
 */
export type RawEnv = Readonly<Record<string, string | undefined>>;

/**
 * Result of activating an isolated environment.
 */
export interface ActivatedEnvironment {
	readonly env: Readonly<Record<string, string>>;
	readonly binDir: string;
}

const pathApi = (platform: NodeJS.Platform): path.PlatformPath =>
	platform === "win32" ? path.win32 : path.posix;

/**
 * Executable directory of a virtual environment.
 *
 * @pure true
 */
export function binDirOf(envDir: string, platform: NodeJS.Platform): string {
	return pathApi(platform).join(
		envDir,
		platform === "win32" ? "Scripts" : "bin",
	);
}

/**
 * Name of the variable holding the command search path.
 *
 * Windows keys are case-insensitive and usually spelled `Path`.
 *
 * @pure true
 */
export function pathKeyOf(env: RawEnv, platform: NodeJS.Platform): string {
	if (platform !== "win32") return "PATH";
	return Object.keys(env).find((key) => key.toUpperCase() === "PATH") ?? "Path";
}

/**
 * Splits a search path into its non-empty entries, in lookup order.
 *
 * @pure true
 * @example
 * ```ts
 * splitSearchPath("/a::/b", "linux"); // ["/a", "/b"]
 * ```
 */
export function splitSearchPath(
	value: string | undefined,
	platform: NodeJS.Platform,
): readonly string[] {
	if (value === undefined) return [];
	return value
		.split(pathApi(platform).delimiter)
		.filter((entry) => entry.length > 0);
}

/**
 * Derives the environment a venv activation script would produce:
 * `VIRTUAL_ENV` set, `PYTHONHOME` removed, the environment's executable
 * directory prepended to the search path.
 *
 * @param base - environment to start from (left untouched)
 * @param envDir - absolute path of the isolated environment
 *
 * @pure true
 * @postcondition splitSearchPath(result.env[pathKey])[0] = result.binDir
 * @complexity O(k)
 */
export function activateEnvironment(
	base: RawEnv,
	envDir: string,
	platform: NodeJS.Platform,
): ActivatedEnvironment {
	const binDir = binDirOf(envDir, platform);
	const pathKey = pathKeyOf(base, platform);
	const env: Record<string, string> = {};

	for (const [key, value] of Object.entries(base)) {
		if (value === undefined || key === "PYTHONHOME") continue;
		env[key] = value;
	}

	const previous = splitSearchPath(base[pathKey], platform);
	env[pathKey] = [binDir, ...previous].join(pathApi(platform).delimiter);
	env["VIRTUAL_ENV"] = envDir;

	return { env, binDir };
}
