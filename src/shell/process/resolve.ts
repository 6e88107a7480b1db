// CHANGE: Command lookup on the execution context's PATH
// WHY: an unresolvable tool is a preparation failure, reported before anything is spawned
// REF: PATHEXT lookup as done by cmd.exe
// PURITY: SHELL (filesystem checks)
// EFFECT: Effect<string, ToolNotFound>
// INVARIANT: lookup uses ctx.env only, never process.env
// COMPLEXITY: O(p · e) where p = PATH entries, e = PATHEXT entries

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { pathKeyOf, splitSearchPath } from "../../core/environment.js";
import { ToolNotFound } from "../../core/errors.js";
import type { ExecutionContext } from "../../core/models.js";

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

/**
 * True for a regular file the current user may execute.
 */
export function isExecutableFile(
	file: string,
	platform: NodeJS.Platform = process.platform,
): boolean {
	try {
		if (!fs.statSync(file).isFile()) return false;
		// Windows has no execute bit; PATHEXT decides instead
		if (platform !== "win32") fs.accessSync(file, fs.constants.X_OK);
		return true;
	} catch {
		return false;
	}
}

/**
 * File names tried for a command in one directory.
 *
 * @pure true
 * @example
 * ```ts
 * candidateNames("flake8", "win32", ".EXE;.CMD"); // ["flake8.exe", "flake8.cmd"]
 * ```
 */
export function candidateNames(
	command: string,
	platform: NodeJS.Platform,
	pathExt: string | undefined,
): readonly string[] {
	if (platform !== "win32") return [command];
	const exts = (pathExt ?? DEFAULT_PATHEXT)
		.split(";")
		.filter((ext) => ext.length > 0)
		.map((ext) => ext.toLowerCase());
	const hasKnownExt = exts.includes(path.win32.extname(command).toLowerCase());
	const expanded = exts.map((ext) => `${command}${ext}`);
	return hasKnownExt ? [command, ...expanded] : expanded;
}

/**
 * Resolves `command` the way a shell would inside the context.
 *
 * Commands containing a path separator are taken relative to `ctx.cwd`;
 * bare names are searched on the context's PATH in order.
 *
 * @returns absolute path of the first executable match
 */
export function resolveExecutable(
	command: string,
	ctx: ExecutionContext,
	platform: NodeJS.Platform = process.platform,
): Effect.Effect<string, ToolNotFound> {
	return Effect.suspend(() => {
		const pathApi = platform === "win32" ? path.win32 : path.posix;
		const pathExt = ctx.env["PATHEXT"];
		const names = candidateNames(command, platform, pathExt);

		if (command.includes("/") || command.includes(pathApi.sep)) {
			const base = pathApi.resolve(ctx.cwd, command);
			const found = candidateNames(base, platform, pathExt).find((file) =>
				isExecutableFile(file, platform),
			);
			return found === undefined
				? Effect.fail(new ToolNotFound({ tool: command, searched: [ctx.cwd] }))
				: Effect.succeed(found);
		}

		const dirs = splitSearchPath(
			ctx.env[pathKeyOf(ctx.env, platform)],
			platform,
		).map((dir) => pathApi.resolve(ctx.cwd, dir));

		for (const dir of dirs) {
			for (const name of names) {
				const file = pathApi.join(dir, name);
				if (isExecutableFile(file, platform)) return Effect.succeed(file);
			}
		}
		return Effect.fail(new ToolNotFound({ tool: command, searched: dirs }));
	});
}
