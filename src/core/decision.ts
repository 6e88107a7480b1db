// CHANGE: Pure decision functions mapping tool outcomes and runner errors to exit codes
// WHY: the process exit status mirrors the tool's status; runner failures get fixed codes
// REF: shell convention 126/127/128+n
// FORMAT THEOREM: ∀r ∈ LintResult: computeExitCode({ kind: "linted", result: r }) = r.exitCode
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping; result ∈ [0, 255]
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type { LintGateError } from "./errors.js";
import {
	EXIT_CONFIG_INVALID,
	EXIT_PREPARE_FAILED,
	EXIT_SIGNAL_BASE,
	EXIT_TOOL_NOT_EXECUTABLE,
	EXIT_TOOL_NOT_FOUND,
	type ExitCode,
	type LintResult,
	type ProcessOutcome,
	type RunOutcome,
} from "./models.js";

const MAX_EXIT_CODE = 255;

/**
 * Signal name → signal number lookup, e.g. `os.constants.signals`.
 */
export type SignalTable = Readonly<Partial<Record<string, number>>>;

/**
 * Converts a raw process outcome into the tool's status code.
 *
 * @param outcome - exit code or terminating signal of the tool
 * @param signals - lookup used for signal-terminated tools
 * @returns status in [0, 255]
 *
 * @pure true
 * @postcondition outcome.code ∈ [0, 255] → result = outcome.code
 * @postcondition outcome.signal = s ∧ signals[s] = n → result = 128 + n
 * @postcondition result = 0 → outcome.code = 0
 * @complexity O(1)
 *
 * @example
 * ```ts
 * toLintResult({ code: null, signal: "SIGTERM" }, { SIGTERM: 15 });
 * // { exitCode: 143 }
 * ```
 */
export function toLintResult(
	outcome: ProcessOutcome,
	signals: SignalTable,
): LintResult {
	if (outcome.code !== null) {
		const inRange =
			Number.isInteger(outcome.code) &&
			outcome.code >= 0 &&
			outcome.code <= MAX_EXIT_CODE;
		// Out-of-range codes (Windows NTSTATUS, negative values) would wrap
		// to arbitrary values under process.exit, possibly 0.
		return { exitCode: inRange ? outcome.code : EXIT_PREPARE_FAILED };
	}
	if (outcome.signal !== null) {
		const signo = signals[outcome.signal];
		return {
			exitCode:
				signo === undefined
					? EXIT_PREPARE_FAILED
					: Math.min(EXIT_SIGNAL_BASE + signo, MAX_EXIT_CODE),
		};
	}
	return { exitCode: EXIT_PREPARE_FAILED };
}

/**
 * Maps every runner error to its exit code.
 *
 * @pure true
 * @invariant ∀ error: exitCodeForError(error) ≠ 0
 * @complexity O(1)
 */
export const exitCodeForError = (error: LintGateError): ExitCode =>
	match(error)
		.with({ _tag: "ConfigError" }, () => EXIT_CONFIG_INVALID)
		.with({ _tag: "DirectoryUnavailable" }, () => EXIT_PREPARE_FAILED)
		.with({ _tag: "EnvironmentUnavailable" }, () => EXIT_PREPARE_FAILED)
		.with({ _tag: "ToolNotFound" }, () => EXIT_TOOL_NOT_FOUND)
		.with({ _tag: "ToolExecError" }, () => EXIT_TOOL_NOT_EXECUTABLE)
		.exhaustive();

/**
 * Computes the process exit code from the terminal state of a run.
 *
 * @param outcome - either the tool's result or the error that stopped the run
 * @returns the tool's own status, or the error's code
 *
 * @pure true
 * @invariant outcome.kind = "linted" → result = outcome.result.exitCode
 * @invariant outcome.kind = "failed" → result ≠ 0
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const code = computeExitCode({ kind: "linted", result: { exitCode: 1 } });
 * // code === 1
 * ```
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	match(outcome)
		.with({ kind: "linted" }, ({ result }) => result.exitCode)
		.with({ kind: "failed" }, ({ error }) => exitCodeForError(error))
		.exhaustive();
