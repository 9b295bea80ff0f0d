// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, ExecError, never>
// INVARIANT: ∀ argv: run(argv) → CommandResult (child completed, any exit code) ∨ ExecError (child never completed)
// COMPLEXITY: O(1) time, O(n) space where n = captured output length

import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { Effect } from "effect";

import { formatCommand } from "../../core/command.js";
import { ExecError } from "../../core/errors.js";
import { extractCommandResult } from "../../core/exec-helpers.js";
import type { CommandResult } from "../../core/models.js";
import type { Logger } from "../output/log.js";

const execFileAsync = promisify(execFile);

// compile_commands.json for a full checkout runs to hundreds of megabytes.
const MAX_BUFFER = 1024 * 1024 * 1024;

/**
 * Runs one external command to completion and captures its output.
 * Substituted with a fake in tests.
 */
export interface CommandRunner {
	readonly run: (
		argv: ReadonlyArray<string>,
	) => Effect.Effect<CommandResult, ExecError>;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * CommandRunner backed by `child_process.execFile` (no shell involved).
 *
 * A non-zero exit is a successful Effect carrying the exit code; only a
 * failure to start or finish the child becomes ExecError.
 *
 * @pure false (spawns processes)
 */
export function createNodeCommandRunner(logger: Logger): CommandRunner {
	return {
		run: (argv) => {
			const command = formatCommand(argv);
			const [program, ...args] = argv;
			if (program === undefined) {
				return Effect.fail(
					new ExecError({ command: "<empty>", detail: "empty argv" }),
				);
			}
			logger.debug(`↳ Command: ${command}`);
			return Effect.tryPromise({
				try: () =>
					execFileAsync(program, args, {
						encoding: "utf8",
						maxBuffer: MAX_BUFFER,
					}),
				catch: (error) => error,
			}).pipe(
				Effect.map(
					({ stdout, stderr }): CommandResult => ({
						exitCode: 0,
						stdout,
						stderr,
					}),
				),
				Effect.catchAll((error) => {
					const completed = extractCommandResult(error);
					if (completed !== null) {
						logger.debug(`↳ Exit code ${completed.exitCode}: ${command}`);
						return Effect.succeed(completed);
					}
					return Effect.fail(
						new ExecError({ command, detail: describe(error) }),
					);
				}),
			);
		},
	};
}
