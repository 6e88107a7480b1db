// CHANGE: Application layer orchestration: config → context → tool → exit code
// WHY: APP composes CORE decisions with SHELL effects; only BIN terminates
// REF: Functional Core, Imperative Shell
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: the tool is invoked only after the context was prepared successfully
// COMPLEXITY: O(1) orchestration; the tool's own runtime dominates

import * as os from "node:os";

import { Effect } from "effect";

import {
	computeExitCode,
	type SignalTable,
	toLintResult,
} from "../core/decision.js";
import type { RawEnv } from "../core/environment.js";
import type {
	ConfigError,
	PrepareError,
	ToolExecError,
} from "../core/errors.js";
import type { ExitCode, LintResult, RunOutcome } from "../core/models.js";
import type { LintGateConfig } from "../core/types/config.js";
import { loadConfig } from "../shell/config/index.js";
import { prepareContext } from "../shell/context/prepare.js";
import { printFailure, progressReporter } from "../shell/output/report.js";
import { resolveExecutable } from "../shell/process/resolve.js";
import {
	type ProcessRunner,
	spawnProcessRunner,
} from "../shell/process/runner.js";

/**
 * Host facts and collaborators a run depends on. Every field defaults to the
 * real process.
 *
 * @property cwd Directory config lookup starts from
 * @property env Environment the isolated environment is activated on top of
 * @property runner Process-execution port used for the lint tool
 * @property signals Signal name → number table for signal-terminated tools
 */
export interface LintGateHost {
	readonly cwd?: string;
	readonly env?: RawEnv;
	readonly platform?: NodeJS.Platform;
	readonly runner?: ProcessRunner;
	readonly signals?: SignalTable;
}

const HOST_SIGNALS: SignalTable = { ...os.constants.signals };

/**
 * Prepares the context, resolves the tool and runs it once.
 *
 * @effect Effect<LintResult, PrepareError | ToolExecError>
 * @postcondition on failure of the prepare step, host.runner.run was not called
 */
export function lintOnce(
	config: LintGateConfig,
	host: LintGateHost = {},
): Effect.Effect<LintResult, PrepareError | ToolExecError> {
	const platform = host.platform ?? process.platform;
	const runner = host.runner ?? spawnProcessRunner;
	const progress = progressReporter(config.verbose);

	return Effect.gen(function* () {
		const ctx = yield* prepareContext(config, {
			env: host.env ?? process.env,
			platform,
		});
		progress.start(ctx.cwd, ctx.envDir);

		const executable = yield* resolveExecutable(config.tool, ctx, platform);
		progress.resolved(executable, config.args);

		const outcome = yield* runner.run(executable, config.args, {
			cwd: ctx.cwd,
			env: ctx.env,
		});
		return toLintResult(outcome, host.signals ?? HOST_SIGNALS);
	});
}

/**
 * Runs the lint tool and returns the exit code as a value.
 *
 * Failures before the tool runs are reported on stderr; the tool's own
 * findings are not annotated.
 *
 * @param host - collaborators; defaults to the real process
 * @param config - skips config loading when given
 *
 * @effect Effect<ExitCode, never> - errors are mapped to exit codes
 * @invariant result = tool status when the tool ran, non-zero otherwise
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(runLintGate());
 * ```
 */
export function runLintGate(
	host: LintGateHost = {},
	config?: LintGateConfig,
): Effect.Effect<ExitCode, never> {
	const loaded: Effect.Effect<LintGateConfig, ConfigError> =
		config === undefined
			? loadConfig({
					cwd: host.cwd ?? process.cwd(),
					env: host.env ?? process.env,
				})
			: Effect.succeed(config);

	return Effect.gen(function* () {
		const outcome: RunOutcome = yield* loaded.pipe(
			Effect.flatMap((cfg) =>
				lintOnce(cfg, host).pipe(
					Effect.tap((result) =>
						Effect.sync(() => {
							progressReporter(cfg.verbose).finished(result.exitCode);
						}),
					),
				),
			),
			Effect.match({
				onFailure: (error): RunOutcome => ({ kind: "failed", error }),
				onSuccess: (result): RunOutcome => ({ kind: "linted", result }),
			}),
		);

		if (outcome.kind === "failed") {
			yield* Effect.sync(() => {
				printFailure(outcome.error);
			});
		}
		return computeExitCode(outcome);
	});
}
