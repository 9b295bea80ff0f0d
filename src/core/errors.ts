// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Command line rejected before any file is processed.
 *
 * @pure true (Data class)
 * @invariant message.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly message: string;
}> {}

/**
 * The tool configuration file exists but cannot be read or parsed.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * compile_commands.json could not be generated. Fatal for the whole run:
 * without it the cleaner cannot resolve include paths.
 *
 * @pure true (Data class)
 */
export class CompileDbError extends Data.TaggedError("CompileDbError")<{
	readonly workDir: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * An external command could not be started (missing executable, killed,
 * output buffer exhausted). A command that ran and exited non-zero is NOT
 * an ExecError; that is a regular CommandResult.
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError =
	| UsageError
	| ConfigError
	| CompileDbError
	| FSError
	| ExecError;
