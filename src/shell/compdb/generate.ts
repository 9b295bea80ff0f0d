// PURITY: SHELL (runs the generator, writes compile_commands.json)
// EFFECT: Effect<void, CompileDbError>
// INVARIANT: compile_commands.json is written only from a generator run that exited 0
// COMPLEXITY: O(n) where n = size of the generated database

import * as path from "node:path";

import { Effect } from "effect";

import { buildCompdbCommand } from "../../core/command.js";
import { CompileDbError } from "../../core/errors.js";
import { COMPILE_COMMANDS_FILE } from "../../core/tables.js";
import type { Logger } from "../output/log.js";
import type { CommandRunner } from "../utils/exec.js";
import { isFile, writeText } from "../utils/fs.js";

/**
 * Make sure `<workDir>/compile_commands.json` exists, generating it when
 * absent. An existing file is never regenerated.
 *
 * @param script - Generator invoked as `<script> -p <workDir>`
 * @returns Effect that fails with CompileDbError when generation fails
 *
 * @pure false (process + filesystem)
 * @effect Effect<void, CompileDbError>
 */
export function ensureCompileCommands(
	runner: CommandRunner,
	logger: Logger,
	script: string,
	workDir: string,
): Effect.Effect<void, CompileDbError> {
	const target = path.join(workDir, COMPILE_COMMANDS_FILE);
	return Effect.gen(function* () {
		if (isFile(target)) {
			return;
		}
		logger.info("Generating compile commands file...");
		const result = yield* runner
			.run(buildCompdbCommand(script, workDir))
			.pipe(
				Effect.mapError(
					(error) => new CompileDbError({ workDir, detail: error.detail }),
				),
			);
		if (result.exitCode !== 0) {
			return yield* Effect.fail(
				new CompileDbError({
					workDir,
					detail: `${script} exited with code ${result.exitCode}: ${result.stderr.trim()}`,
				}),
			);
		}
		yield* writeText(target, result.stdout).pipe(
			Effect.mapError(
				(error) => new CompileDbError({ workDir, detail: error.detail }),
			),
		);
	});
}
