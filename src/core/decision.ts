// FORMAT THEOREM: ∀s ∈ State: (s.checkForChanges ∧ s.changesGenerated) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import * as path from "node:path";

import type { DecisionState, ExitCode, FileOutcome } from "./models.js";
import { SUPPORTED_SUFFIXES } from "./tables.js";

/**
 * Computes the process exit code once every file was processed.
 *
 * Only check mode turns pending changes into a failure; in edit and print
 * mode the run succeeds whatever the cleaner reported.
 *
 * @pure true
 * @postcondition (state.checkForChanges ∧ state.changesGenerated) → result = 1
 *
 * @example
 * ```ts
 * computeExitCode({ checkForChanges: true, changesGenerated: true }); // 1
 * computeExitCode({ checkForChanges: false, changesGenerated: true }); // 0
 * ```
 */
export function computeExitCode(state: DecisionState): ExitCode {
	return state.checkForChanges && state.changesGenerated ? 1 : 0;
}

/**
 * True when the file's last extension is one the cleaner is run on.
 *
 * @pure true
 */
export function isSupportedSource(file: string): boolean {
	return SUPPORTED_SUFFIXES.includes(path.extname(file));
}

/**
 * A file contributes to "changes generated" iff the cleaner ran on it and
 * its adjusted report is non-empty.
 *
 * @pure true
 */
export function hasChanges(outcome: FileOutcome): boolean {
	return outcome.kind === "cleaned" && outcome.output.length > 0;
}
