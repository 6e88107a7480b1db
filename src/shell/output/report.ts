// CHANGE: stderr reporting for failures that happen before the lint tool runs
// WHY: each failure names the path involved and one action to take
// PURITY: SHELL (console output)
// INVARIANT: nothing is printed for the tool's own findings; stdout is left to the tool
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { LintGateError } from "../../core/errors.js";
import type { ExitCode } from "../../core/models.js";

/**
 * Lines describing a runner error, without the header.
 *
 * @pure true
 */
export function describeError(error: LintGateError): readonly string[] {
	return match(error)
		.with({ _tag: "ConfigError" }, (e) => [
			`  • Configuration file ${e.path} is invalid: ${e.detail}.`,
			"    Action: Fix the file or unset LINT_GATE_CONFIG to use the defaults.",
		])
		.with({ _tag: "DirectoryUnavailable", reason: "missing" }, (e) => [
			`  • Project directory ${e.path} does not exist.`,
			'    Action: Set "projectDir" in lint-gate.config.json.',
		])
		.with({ _tag: "DirectoryUnavailable", reason: "notDirectory" }, (e) => [
			`  • Project path ${e.path} is not a directory.`,
			'    Action: Set "projectDir" in lint-gate.config.json.',
		])
		.with({ _tag: "DirectoryUnavailable", reason: "inaccessible" }, (e) => [
			`  • Project directory ${e.path} cannot be entered.`,
			"    Action: Check its permissions.",
		])
		.with({ _tag: "EnvironmentUnavailable", reason: "missing" }, (e) => [
			`  • Isolated environment ${e.envDir} was not found.`,
			"    Action: Create it (for example: python -m venv venv) and install the lint tool into it.",
		])
		.with({ _tag: "EnvironmentUnavailable", reason: "noBinDir" }, (e) => [
			`  • Isolated environment ${e.envDir} has no executable directory.`,
			"    Action: Recreate the environment.",
		])
		.with({ _tag: "ToolNotFound" }, (e) => [
			`  • Lint tool "${e.tool}" is not on the environment's command path.`,
			`    Searched: ${e.searched.length === 0 ? "(empty PATH)" : e.searched.join(", ")}`,
			`    Action: Install it into the environment (for example: pip install ${e.tool}).`,
		])
		.with({ _tag: "ToolExecError" }, (e) => [
			`  • Lint tool ${e.command} could not be started: ${e.detail}.`,
		])
		.exhaustive();
}

/**
 * Prints an actionable report for a failed run to stderr.
 */
export function printFailure(error: LintGateError): void {
	console.error("\n[ERROR] lint-gate could not run the lint tool:\n");
	for (const line of describeError(error)) {
		console.error(line);
	}
	console.error("");
}

/**
 * Progress lines, printed only in verbose mode.
 */
export interface ProgressReporter {
	readonly start: (cwd: string, envDir: string) => void;
	readonly resolved: (executable: string, args: readonly string[]) => void;
	readonly finished: (code: ExitCode) => void;
}

const silent: ProgressReporter = {
	start: () => undefined,
	resolved: () => undefined,
	finished: () => undefined,
};

const verbose: ProgressReporter = {
	start: (cwd, envDir) => {
		console.error(`🔍 Linting directory: ${cwd}`);
		console.error(`   Environment: ${envDir}`);
	},
	resolved: (executable, args) => {
		console.error(`   Running: ${[executable, ...args].join(" ")}`);
	},
	finished: (code) => {
		console.error(
			code === 0 ? "✅ Lint passed" : `❌ Lint tool exited with status ${code}`,
		);
	},
};

export const progressReporter = (enabled: boolean): ProgressReporter =>
	enabled ? verbose : silent;
