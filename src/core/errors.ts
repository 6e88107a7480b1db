// CHANGE: Typed domain error ADT for the runner using Effect.Data
// WHY: failures travel in the Effect error channel and are matched exhaustively
// REF: Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Configuration file could not be read or has a field of the wrong type.
 *
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Project directory cannot be entered.
 */
export class DirectoryUnavailable extends Data.TaggedError(
	"DirectoryUnavailable",
)<{
	readonly path: string;
	readonly reason: "missing" | "notDirectory" | "inaccessible";
}> {}

/**
 * Isolated environment cannot be activated.
 */
export class EnvironmentUnavailable extends Data.TaggedError(
	"EnvironmentUnavailable",
)<{
	readonly envDir: string;
	readonly reason: "missing" | "noBinDir";
}> {}

/**
 * Lint tool is not on the context's command path.
 *
 * @invariant searched lists the PATH entries in lookup order
 */
export class ToolNotFound extends Data.TaggedError("ToolNotFound")<{
	readonly tool: string;
	readonly searched: readonly string[];
}> {}

/**
 * Lint tool was resolved but the process could not be started.
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ToolExecError extends Data.TaggedError("ToolExecError")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Failures of the prepare step (before the tool is invoked).
 */
export type PrepareError =
	| DirectoryUnavailable
	| EnvironmentUnavailable
	| ToolNotFound;

/**
 * Union of all runner errors for Effect signatures.
 */
export type LintGateError = ConfigError | PrepareError | ToolExecError;
