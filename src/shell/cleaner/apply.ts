// PURITY: SHELL (runs clang-include-cleaner, reads and rewrites the source file)
// EFFECT: Effect<FileOutcome, FSError>
// INVARIANT: ¬shouldModify → the file on disk is never written by this module
// INVARIANT: a non-zero cleaner exit is recorded in the outcome, never raised
// COMPLEXITY: O(n·m) where n = file size, m = |mappings|

import { Effect } from "effect";

import type { FSError } from "../../core/errors.js";
import type {
	CommandResult,
	FileOutcome,
	IncludeMapping,
} from "../../core/models.js";
import { adjustCleanerOutput, rewriteIncludes } from "../../core/rewrite.js";
import type { CommandRunner } from "../utils/exec.js";
import { readText, writeText } from "../utils/fs.js";

// Shell convention for "command not found".
const SPAWN_FAILURE_EXIT_CODE = 127;

// Sources are not guaranteed to be UTF-8 (Latin-1 comments exist). Every
// pattern applied here is ASCII, so a byte-preserving decoding is enough.
const SOURCE_ENCODING = "latin1";

/**
 * Everything the per-file step needs besides the file itself.
 */
export interface CleanerStep {
	readonly runner: CommandRunner;
	/** Base cleaner argv; the file path is appended per call. */
	readonly command: ReadonlyArray<string>;
	readonly shouldModify: boolean;
	readonly mappings: ReadonlyArray<IncludeMapping>;
}

function runCleaner(
	runner: CommandRunner,
	argv: ReadonlyArray<string>,
): Effect.Effect<CommandResult> {
	return runner.run(argv).pipe(
		Effect.catchTag("Exec", (error) =>
			Effect.succeed<CommandResult>({
				exitCode: SPAWN_FAILURE_EXIT_CODE,
				stdout: "",
				stderr: error.detail,
			}),
		),
	);
}

/**
 * Applies the include cleaner binary to a given file, then the project's
 * include remapping, and strips redundant additions from the report.
 *
 * The file is read after the cleaner ran: with `--edit` the cleaner has
 * already rewritten it, and the remap runs on top of its edits. Bytes outside
 * the rewritten includes reach the disk unchanged.
 *
 * @returns `cleaned` outcome; `output` is the adjusted report (empty = no changes)
 *
 * @pure false
 * @effect Effect<FileOutcome, FSError>
 */
export function applyIncludeCleanerToFile(
	step: CleanerStep,
	file: string,
): Effect.Effect<FileOutcome, FSError> {
	return Effect.gen(function* () {
		const result = yield* runCleaner(step.runner, [...step.command, file]);
		const failure = result.exitCode !== 0 ? result.stderr.trim() : null;

		const content = yield* readText(file, SOURCE_ENCODING);
		const output = adjustCleanerOutput(result.stdout.trim(), content);

		let modified = false;
		if (step.shouldModify) {
			const rewritten = rewriteIncludes(content, step.mappings);
			if (rewritten !== content) {
				yield* writeText(file, rewritten, SOURCE_ENCODING);
				modified = true;
			}
		}

		const outcome: FileOutcome = {
			kind: "cleaned",
			file,
			output,
			failure,
			modified,
		};
		return outcome;
	});
}
