// PURITY: SHELL (filesystem check, console output)
// INVARIANT: Advisory only; the run continues whatever preflight reports
// COMPLEXITY: O(1)

import * as fs from "node:fs";

import type { Logger } from "../output/log.js";

/**
 * Preflight issue codes.
 *
 * - `missingCleaner`: clang-include-cleaner is not at the configured path
 */
export type PreflightIssueCode = "missingCleaner";

/**
 * Check the environment before the run.
 *
 * @param cleanerBinary - Configured cleaner path
 * @returns Detected issues (empty when everything is in place)
 */
export function runPreflight(
	cleanerBinary: string,
): ReadonlyArray<PreflightIssueCode> {
	return fs.existsSync(cleanerBinary) ? [] : ["missingCleaner"];
}

/**
 * Print guidance for each issue. The cleaner ships with the clangd package of
 * the LLVM build, which gclient only fetches when asked to.
 */
export function printPreflightReport(
	issues: ReadonlyArray<PreflightIssueCode>,
	cleanerBinary: string,
	logger: Logger,
): void {
	for (const issue of issues) {
		if (issue === "missingCleaner") {
			logger.info(`clang-include-cleaner not found in ${cleanerBinary}`);
			logger.info(
				"Add '\"checkout_clangd\": True' to 'custom_vars' in your .gclient file and run 'gclient sync'.",
			);
		}
	}
}

/**
 * Run preflight and report. Returns true when no issue was found.
 */
export function checkAndReportPreflight(
	cleanerBinary: string,
	logger: Logger,
): boolean {
	const issues = runPreflight(cleanerBinary);
	printPreflightReport(issues, cleanerBinary, logger);
	return issues.length === 0;
}
