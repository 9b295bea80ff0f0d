// PURITY: SHELL (console output)
// INVARIANT: exactly one report per processed file; unsupported files print nothing at info level
// COMPLEXITY: O(|output|)

import { match } from "ts-pattern";

import type { FileOutcome } from "../../core/models.js";
import type { Logger } from "./log.js";

/**
 * Print the result of one file.
 *
 * - not referenced by GN → skip notice
 * - cleaner failed → file and stderr on the error stream
 * - cleaner ran → its report, or a success line when it had nothing to say
 */
export function reportFileOutcome(outcome: FileOutcome, logger: Logger): void {
	match(outcome)
		.with({ kind: "unsupported" }, ({ file }) => {
			logger.debug(`Skipping ${file}: not a .cc or .h file`);
		})
		.with({ kind: "notBuilt" }, ({ file }) => {
			logger.info(
				`Skipping include cleaner as ${file} is not referenced by GN.`,
			);
		})
		.with({ kind: "cleaned" }, ({ file, output, failure }) => {
			if (failure !== null) {
				logger.error(
					`Failed to run include cleaner on ${file}, stderr: ${failure}`,
				);
			}
			logger.info(
				output.length > 0 ? output : `Successfully ran include cleaner on ${file}`,
			);
		})
		.exhaustive();
}

/**
 * Closing reminder of the manual steps left after a run.
 */
export function printReminder(logger: Logger): void {
	logger.info(
		"Finished. Check diff, compile, gn gen --check (tools_webrtc/gn_check_autofix.py can fix most of the issues)",
	);
	logger.info("and git cl format before uploading.");
}
