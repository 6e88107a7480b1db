// CHANGE: Public API entry point for library consumers
// WHY: programmatic callers get the exit code as a value instead of a terminated process
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect-returning SHELL/APP functions
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs the configured lint tool without terminating the process.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runLintGate } from "lint-gate";
 *
 * const exitCode = await Effect.runPromise(runLintGate());
 * if (exitCode === 0) {
 *   console.log("✅ No lint findings");
 * }
 * ```
 */
export { type LintGateHost, lintOnce, runLintGate } from "./app/runLintGate.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export {
	computeExitCode,
	exitCodeForError,
	type SignalTable,
	toLintResult,
} from "./core/decision.js";
export {
	type ActivatedEnvironment,
	activateEnvironment,
	binDirOf,
	type RawEnv,
	splitSearchPath,
} from "./core/environment.js";
export {
	ConfigError,
	DirectoryUnavailable,
	EnvironmentUnavailable,
	type LintGateError,
	type PrepareError,
	ToolExecError,
	ToolNotFound,
} from "./core/errors.js";
export {
	EXIT_CONFIG_INVALID,
	EXIT_OK,
	EXIT_PREPARE_FAILED,
	EXIT_SIGNAL_BASE,
	EXIT_TOOL_NOT_EXECUTABLE,
	EXIT_TOOL_NOT_FOUND,
	type ExecutionContext,
	type ExitCode,
	type LintResult,
	type ProcessOutcome,
	type RunOutcome,
} from "./core/models.js";
export {
	DEFAULT_CONFIG,
	DEFAULT_CONFIG_FILE,
	type LintGateConfig,
	type LintGateConfigInput,
} from "./core/types/config.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL
// ═══════════════════════════════════════════════════════════════════════════════

export { loadConfig, type LoadConfigOptions } from "./shell/config/index.js";
export { type PrepareOptions, prepareContext } from "./shell/context/prepare.js";
export { resolveExecutable } from "./shell/process/resolve.js";
export {
	type ProcessOptions,
	type ProcessRunner,
	spawnProcessRunner,
} from "./shell/process/runner.js";
