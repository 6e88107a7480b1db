// CHANGE: Functional Core domain models for the runner (pure, immutable)
// WHY: CORE holds only types and constants; effects live in SHELL
// REF: Functional Core, Imperative Shell
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { LintGateError } from "./errors.js";

/**
 * Process status produced by the runner.
 *
 * @remarks
 * - @invariant 0 ≤ exitCode ≤ 255
 */
export type ExitCode = number;

export const EXIT_OK = 0;
export const EXIT_PREPARE_FAILED = 1;
export const EXIT_CONFIG_INVALID = 2;
export const EXIT_TOOL_NOT_EXECUTABLE = 126;
export const EXIT_TOOL_NOT_FOUND = 127;
export const EXIT_SIGNAL_BASE = 128;

/**
 * Scoped execution context for a single run.
 *
 * Replaces `cd` + `source venv/bin/activate`: nothing here is written back to
 * `process.cwd()` or `process.env`.
 *
 * @property cwd Absolute directory the tool runs in
 * @property env Environment map with the isolated environment activated
 * @property envDir Absolute path of the isolated environment
 * @property binDir Executable directory of the environment, first on PATH
 */
export interface ExecutionContext {
	readonly cwd: string;
	readonly env: Readonly<Record<string, string>>;
	readonly envDir: string;
	readonly binDir: string;
}

/**
 * How the external tool finished.
 *
 * @invariant exactly one of code/signal is non-null for a finished process
 */
export interface ProcessOutcome {
	readonly code: number | null;
	readonly signal: string | null;
}

/**
 * Status reported by the lint tool, consumed immediately.
 */
export interface LintResult {
	readonly exitCode: ExitCode;
}

/**
 * Terminal state of a run: the tool reported a status, or a step before it
 * failed.
 *
 * @remarks
 * - Running → Terminated is the only transition; there are no retries.
 */
export type RunOutcome =
	| { readonly kind: "linted"; readonly result: LintResult }
	| { readonly kind: "failed"; readonly error: LintGateError };
