// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP entry points
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the cleaner over a list of files.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import {
 *   createConsoleLogger,
 *   createNodeCommandRunner,
 *   loadToolConfig,
 *   runIncludeCleaner,
 * } from "include-cleaner-apply";
 *
 * const logger = createConsoleLogger(false);
 * const program = Effect.flatMap(loadToolConfig(process.cwd(), process.env), (config) =>
 *   runIncludeCleaner(
 *     { files: ["pc/foo.cc"], print: true, checkForChanges: false, workDir: "out/Default" },
 *     { runner: createNodeCommandRunner(logger), logger, config },
 *   ),
 * );
 * const exitCode = await Effect.runPromise(program);
 * ```
 */
export { runIncludeCleaner, selectMode } from "./app/runIncludeCleaner.js";
export type { RunDeps } from "./app/runIncludeCleaner.js";
export { main } from "./main.js";
export type { MainEnvironment } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (pure functions, tables, immutable models)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	buildCleanerCommand,
	buildCompdbCommand,
	buildGnRefsCommand,
	formatCommand,
} from "./core/command.js";
export type { CleanerCommandOptions } from "./core/command.js";
export {
	computeExitCode,
	hasChanges,
	isSupportedSource,
} from "./core/decision.js";
export {
	CompileDbError,
	ConfigError,
	ExecError,
	FSError,
	UsageError,
} from "./core/errors.js";
export type { AppError } from "./core/errors.js";
export type {
	CleanerMode,
	CommandResult,
	DecisionState,
	ExitCode,
	FileOutcome,
	IncludeMapping,
	ToolConfig,
} from "./core/models.js";
export { adjustCleanerOutput, rewriteIncludes } from "./core/rewrite.js";
export {
	EXTRA_ARGS,
	GTEST_CANONICAL,
	GTEST_DEPRECATED,
	IGNORED_HEADERS,
	INCLUDE_MAPPINGS,
	SUPPORTED_SUFFIXES,
} from "./core/tables.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (collaborators that can be replaced)
// ═══════════════════════════════════════════════════════════════════════════════

export { parseCLIArgs, validateCLIOptions } from "./shell/config/cli.js";
export type { CLIOptions, ParsedCommandLine } from "./shell/config/cli.js";
export { loadToolConfig } from "./shell/config/loader.js";
export { createConsoleLogger } from "./shell/output/log.js";
export type { Logger } from "./shell/output/log.js";
export { createNodeCommandRunner } from "./shell/utils/exec.js";
export type { CommandRunner } from "./shell/utils/exec.js";
