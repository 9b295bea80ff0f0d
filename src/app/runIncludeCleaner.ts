// PURITY: APP (composes CORE decisions with SHELL effects; no process.exit)
// EFFECT: Effect<ExitCode, CompileDbError | FSError>
// INVARIANT: files are processed one at a time, in argument order
// INVARIANT: a file is handed to gn only if its suffix is supported, to the cleaner only if gn references it
// COMPLEXITY: O(n) process invocations where n = |files|

import { Effect } from "effect";

import { buildCleanerCommand } from "../core/command.js";
import {
	computeExitCode,
	hasChanges,
	isSupportedSource,
} from "../core/decision.js";
import type { CompileDbError, FSError } from "../core/errors.js";
import type {
	CleanerMode,
	ExitCode,
	FileOutcome,
	ToolConfig,
} from "../core/models.js";
import {
	applyIncludeCleanerToFile,
	type CleanerStep,
} from "../shell/cleaner/apply.js";
import { ensureCompileCommands } from "../shell/compdb/generate.js";
import type { CLIOptions } from "../shell/config/cli.js";
import { isBuilt } from "../shell/gn/refs.js";
import type { Logger } from "../shell/output/log.js";
import { printReminder, reportFileOutcome } from "../shell/output/report.js";
import type { CommandRunner } from "../shell/utils/exec.js";

/**
 * Collaborators of a run. Tests pass a fake runner and a capturing logger.
 */
export interface RunDeps {
	readonly runner: CommandRunner;
	readonly logger: Logger;
	readonly config: ToolConfig;
}

/**
 * Print and check modes only report; edit mode lets the cleaner and the
 * remap rewrite files.
 *
 * @pure true
 */
export function selectMode(options: CLIOptions): CleanerMode {
	return options.print || options.checkForChanges ? "print" : "edit";
}

function processFile(
	deps: RunDeps,
	step: CleanerStep,
	workDir: string,
	file: string,
): Effect.Effect<FileOutcome, FSError> {
	if (!isSupportedSource(file)) {
		return Effect.succeed<FileOutcome>({ kind: "unsupported", file });
	}
	return Effect.gen(function* () {
		const built = yield* isBuilt(
			deps.runner,
			deps.logger,
			deps.config.gnBinary,
			workDir,
			file,
		);
		if (!built) {
			const skipped: FileOutcome = { kind: "notBuilt", file };
			return skipped;
		}
		return yield* applyIncludeCleanerToFile(step, file);
	});
}

/**
 * Orchestrates the run and returns ExitCode as value (no process.exit).
 *
 * Steps: compile database (fatal on failure) → per-file gn check and
 * cleaner → reminder → exit code. The preflight check belongs to the caller.
 *
 * @returns Effect<ExitCode, CompileDbError | FSError>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @postcondition result = 1 ↔ checkForChanges ∧ ∃ file with a non-empty adjusted report
 */
export function runIncludeCleaner(
	options: CLIOptions,
	deps: RunDeps,
): Effect.Effect<ExitCode, CompileDbError | FSError> {
	return Effect.gen(function* () {
		const { config, logger, runner } = deps;
		yield* ensureCompileCommands(
			runner,
			logger,
			config.compdbScript,
			options.workDir,
		);

		const mode = selectMode(options);
		const step: CleanerStep = {
			runner,
			command: buildCleanerCommand({
				cleanerBinary: config.cleanerBinary,
				workDir: options.workDir,
				ignoredHeaders: config.ignoredHeaders,
				extraArgs: config.extraArgs,
				mode,
			}),
			shouldModify: mode === "edit",
			mappings: config.includeMappings,
		};

		let changesGenerated = false;
		// TODO: pass every file to a single cleaner invocation instead of one process per file
		for (const file of options.files) {
			const outcome = yield* processFile(deps, step, options.workDir, file);
			reportFileOutcome(outcome, logger);
			changesGenerated = hasChanges(outcome) || changesGenerated;
		}

		printReminder(logger);
		return computeExitCode({
			checkForChanges: options.checkForChanges,
			changesGenerated,
		});
	});
}
