// PURITY: APP (no process.exit; only composition)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: every typed failure is reported once and mapped to an ExitCode
// COMPLEXITY: O(1) besides the delegated run

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { runIncludeCleaner } from "./app/runIncludeCleaner.js";
import type { AppError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import { checkAndReportPreflight } from "./shell/analysis/preflight.js";
import {
	formatHelp,
	formatUsageLine,
	PROGRAM_NAME,
	parseCLIArgs,
	validateCLIOptions,
} from "./shell/config/cli.js";
import { loadToolConfig } from "./shell/config/loader.js";
import type { Logger } from "./shell/output/log.js";
import type { CommandRunner } from "./shell/utils/exec.js";

const EXIT_SUCCESS: ExitCode = 0;
const EXIT_FAILURE: ExitCode = 1;
const EXIT_USAGE: ExitCode = 2;

/**
 * Process-level inputs of a run.
 */
export interface MainEnvironment {
	readonly cwd: string;
	readonly env: NodeJS.ProcessEnv;
	readonly logger: Logger;
	readonly runner: CommandRunner;
}

/**
 * Print a typed failure and pick the exit code for it.
 *
 * @pure false (logger output)
 */
export function reportFailure(error: AppError, logger: Logger): ExitCode {
	return match(error)
		.with({ _tag: "UsageError" }, (e) => {
			logger.error(formatUsageLine());
			logger.error(`${PROGRAM_NAME}: error: ${e.message}`);
			return EXIT_USAGE;
		})
		.with({ _tag: "ConfigError" }, (e) => {
			logger.error(`Fatal error: cannot load ${e.path}: ${e.detail}`);
			return EXIT_FAILURE;
		})
		.with({ _tag: "CompileDbError" }, (e) => {
			logger.error(
				`Fatal error: could not generate compile commands in ${e.workDir}: ${e.detail}`,
			);
			return EXIT_FAILURE;
		})
		.with({ _tag: "FS" }, (e) => {
			logger.error(`Fatal error: ${e.path}: ${e.detail}`);
			return EXIT_FAILURE;
		})
		.with({ _tag: "Exec" }, (e) => {
			logger.error(`Fatal error: ${e.command}: ${e.detail}`);
			return EXIT_FAILURE;
		})
		.exhaustive();
}

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args - Command line without node and script path
 * @returns Effect<ExitCode, never>
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(main(["-c", "pc/foo.cc"], environment));
 * ```
 */
export function main(
	args: ReadonlyArray<string>,
	environment: MainEnvironment,
): Effect.Effect<ExitCode> {
	const { logger, runner } = environment;
	return Effect.gen(function* () {
		const config = yield* loadToolConfig(environment.cwd, environment.env);
		// Advisory, and printed even when the command line is rejected below.
		checkAndReportPreflight(config.cleanerBinary, logger);

		const parsed = parseCLIArgs(args, config.defaultWorkDir);
		if (Either.isLeft(parsed)) {
			return yield* Effect.fail(parsed.left);
		}
		const commandLine = parsed.right;
		if (commandLine.kind === "help") {
			logger.info(formatHelp(config.defaultWorkDir));
			return EXIT_SUCCESS;
		}

		const options = yield* validateCLIOptions(commandLine.options);
		return yield* runIncludeCleaner(options, { runner, logger, config });
	}).pipe(
		Effect.catchAll((error: AppError) =>
			Effect.succeed(reportFailure(error, logger)),
		),
	);
}
