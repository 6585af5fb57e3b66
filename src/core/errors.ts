// CHANGE: Typed domain errors for the installer as Effect tagged errors
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Unrecognized command-line flag.
 *
 * @invariant flag.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly flag: string;
}> {}

/**
 * No isolated Python environment is active.
 *
 * @invariant variable names the environment marker that was empty
 */
export class MissingVirtualEnv extends Data.TaggedError("MissingVirtualEnv")<{
	readonly variable: string;
}> {}

/**
 * A version label could not be derived from tool output.
 *
 * @invariant subject identifies which query produced `output`
 */
export class VersionResolutionError extends Data.TaggedError(
	"VersionResolutionError",
)<{
	readonly subject: string;
	readonly output: string;
}> {}

/**
 * External command failed to start or exited non-zero.
 *
 * @invariant exitCode > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly exitCode: number;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Union of every failure the installer can surface.
 */
export type InstallerError =
	| MissingVirtualEnv
	| VersionResolutionError
	| ExecError
	| FSError;
