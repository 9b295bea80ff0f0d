#!/usr/bin/env node

// PURITY: SHELL (BIN layer)
// INVARIANT: Single point where the process exit status is set; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../main.js";
import { createConsoleLogger, isDebugEnabled } from "../shell/output/log.js";
import { createNodeCommandRunner } from "../shell/utils/exec.js";

/**
 * CLI entry point for apply-include-cleaner.
 *
 * @remarks
 * - @pure false (process environment, console I/O)
 * - @invariant exit status is 0, 1 or 2 (see ExitCode)
 * - @postcondition the exit status is assigned exactly once; the process ends
 *   once stdout is flushed, so long cleaner reports are never cut off
 */
void (async (): Promise<void> => {
	try {
		const logger = createConsoleLogger(isDebugEnabled(process.env));
		const code = await Effect.runPromise(
			main(process.argv.slice(2), {
				cwd: process.cwd(),
				env: process.env,
				logger,
				runner: createNodeCommandRunner(logger),
			}),
		);
		process.exitCode = code;
	} catch (error) {
		// Defects only; typed failures are mapped to exit codes by main()
		console.error("Fatal error:", error);
		process.exitCode = 1;
	}
})();
