// CHANGE: Process-execution port for the external lint tool
// WHY: the app layer must run against in-process fakes in tests
// REF: child_process.spawn with inherited stdio
// PURITY: SHELL (spawns processes)
// EFFECT: Effect<ProcessOutcome, ToolExecError>
// INVARIANT: the effect resumes exactly once; spawn failures become ToolExecError
// COMPLEXITY: O(1) besides the child's own runtime

import { type ChildProcess, spawn } from "node:child_process";

import { Effect } from "effect";

import { ToolExecError } from "../../core/errors.js";
import type { ProcessOutcome } from "../../core/models.js";

/**
 * Where and how the child runs.
 */
export interface ProcessOptions {
	readonly cwd: string;
	readonly env: Readonly<Record<string, string>>;
}

/**
 * Runs an external command to completion and reports how it ended.
 */
export interface ProcessRunner {
	run(
		command: string,
		args: readonly string[],
		options: ProcessOptions,
	): Effect.Effect<ProcessOutcome, ToolExecError>;
}

/**
 * Wraps `.cmd`/`.bat` files with `cmd.exe /c` on Windows.
 *
 * @pure true
 */
export function resolveSpawn(
	command: string,
	args: readonly string[],
	platform: NodeJS.Platform,
	comspec: string | undefined,
): { readonly command: string; readonly args: readonly string[] } {
	if (platform !== "win32") return { command, args };
	const normalized = command.toLowerCase();
	if (normalized.endsWith(".cmd") || normalized.endsWith(".bat")) {
		return { command: comspec ?? "cmd.exe", args: ["/c", command, ...args] };
	}
	return { command, args };
}

/**
 * Default runner: `child_process.spawn` with inherited stdio, so the tool's
 * diagnostics reach the terminal untouched.
 */
export const spawnProcessRunner: ProcessRunner = {
	run: (command, args, options) =>
		Effect.async<ProcessOutcome, ToolExecError>((resume) => {
			const spec = resolveSpawn(
				command,
				args,
				process.platform,
				options.env["ComSpec"],
			);
			let settled = false;
			const settle = (
				effect: Effect.Effect<ProcessOutcome, ToolExecError>,
			): void => {
				if (settled) return;
				settled = true;
				resume(effect);
			};

			// spawn throws synchronously on invalid arguments (e.g. NUL bytes)
			let child: ChildProcess;
			try {
				child = spawn(spec.command, [...spec.args], {
					cwd: options.cwd,
					env: options.env,
					stdio: "inherit",
				});
			} catch (error) {
				settle(
					Effect.fail(
						new ToolExecError({
							command,
							detail: error instanceof Error ? error.message : String(error),
						}),
					),
				);
				return;
			}
			child.once("error", (error) => {
				settle(
					Effect.fail(
						new ToolExecError({ command, detail: error.message }),
					),
				);
			});
			child.once("close", (code, signal) => {
				settle(Effect.succeed({ code, signal }));
			});
		}),
};
