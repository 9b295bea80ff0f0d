// PURITY: SHELL (runs gn)
// EFFECT: Effect<boolean, never>
// INVARIANT: isBuilt(file) ↔ `gn refs` ran and exited 0
// COMPLEXITY: O(1) process invocations

import { Effect } from "effect";

import { buildGnRefsCommand } from "../../core/command.js";
import type { Logger } from "../output/log.js";
import type { CommandRunner } from "../utils/exec.js";

/**
 * Check that the file is part of a build target on this platform.
 *
 * Only the exit status of `gn refs` matters. A gn that cannot be started
 * counts as "not referenced".
 *
 * @pure false (spawns gn)
 * @effect Effect<boolean, never>
 */
export function isBuilt(
	runner: CommandRunner,
	logger: Logger,
	gnBinary: string,
	workDir: string,
	file: string,
): Effect.Effect<boolean> {
	return runner.run(buildGnRefsCommand(gnBinary, workDir, file)).pipe(
		Effect.map((result) => result.exitCode === 0),
		Effect.catchTag("Exec", (error) => {
			logger.debug(`gn could not be started: ${error.detail}`);
			return Effect.succeed(false);
		}),
	);
}
