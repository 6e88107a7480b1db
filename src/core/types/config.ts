// CHANGE: Configuration shape and built-in defaults for the runner
// WHY: built-in defaults apply unless a config file overrides them
// PURITY: CORE
// INVARIANT: configuration is immutable once loaded

/**
 * Runner configuration.
 *
 * @property projectDir Absolute directory the tool is run in
 * @property envDir Absolute path of the pre-built isolated environment
 * @property tool Command name of the lint tool
 * @property args Arguments passed to the tool
 * @property verbose Print progress lines to stderr
 */
export interface LintGateConfig {
	readonly projectDir: string;
	readonly envDir: string;
	readonly tool: string;
	readonly args: ReadonlyArray<string>;
	readonly verbose: boolean;
}

/**
 * Configuration as written in lint-gate.config.json, before path resolution.
 */
export interface LintGateConfigInput {
	readonly projectDir?: string;
	readonly envDir?: string;
	readonly tool?: string;
	readonly args?: ReadonlyArray<string>;
	readonly verbose?: boolean;
}

export const DEFAULT_CONFIG_FILE = "lint-gate.config.json";

export const DEFAULT_CONFIG: Required<LintGateConfigInput> = {
	projectDir: "BackendService",
	envDir: "venv",
	tool: "flake8",
	args: ["."],
	verbose: false,
};
