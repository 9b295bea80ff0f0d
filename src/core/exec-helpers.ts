// PURITY: CORE
// INVARIANT: A rejection carries a CommandResult iff the child ran and exited with a numeric status
// COMPLEXITY: O(1)

import type { CommandResult } from "./models.js";

/**
 * Recover the exit status and captured streams from a rejected
 * `execFile` promise.
 *
 * Node rejects both when the child exits non-zero (numeric `code`) and when
 * it cannot be started at all (string `code` such as `"ENOENT"`). Only the
 * first is a completed command.
 *
 * @param error - Value the promise rejected with
 * @returns CommandResult, or null when the child never completed
 *
 * @pure true
 *
 * @example
 * ```ts
 * extractCommandResult({ code: 1, stdout: "", stderr: "boom" });
 * // => { exitCode: 1, stdout: "", stderr: "boom" }
 * extractCommandResult({ code: "ENOENT" }); // => null
 * ```
 */
export function extractCommandResult(error: unknown): CommandResult | null {
	if (typeof error !== "object" || error === null || !("code" in error)) {
		return null;
	}
	const code = error.code;
	if (typeof code !== "number") {
		return null;
	}
	const stdout =
		"stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
	const stderr =
		"stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
	return { exitCode: code, stdout, stderr };
}
