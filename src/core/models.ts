// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Process exit code.
 *
 * @remarks
 * - 0: success, no pending changes (or changes applied)
 * - 1: check mode found pending include changes, or the run aborted
 * - 2: command line rejected
 */
export type ExitCode = 0 | 1 | 2;

/**
 * How the cleaner treats the file: rewrite it in place or only print the
 * changes it would make.
 */
export type CleanerMode = "edit" | "print";

/**
 * Literal include spelling rewrite, as it appears after `#include `.
 *
 * @example
 * ```ts
 * const m: IncludeMapping = { from: '"gmock/gmock.h"', to: '"test/gmock.h"' };
 * ```
 */
export interface IncludeMapping {
	readonly from: string;
	readonly to: string;
}

/**
 * Captured outcome of one external process that ran to completion.
 *
 * @invariant exitCode is the process exit status (0 = success)
 */
export interface CommandResult {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Per-file result of the driver loop.
 *
 * - `unsupported`: suffix is neither `.cc` nor `.h`; nothing ran
 * - `notBuilt`: GN does not reference the file; the cleaner did not run
 * - `cleaned`: the cleaner ran; `output` is its adjusted change report
 */
export type FileOutcome =
	| { readonly kind: "unsupported"; readonly file: string }
	| { readonly kind: "notBuilt"; readonly file: string }
	| {
			readonly kind: "cleaned";
			readonly file: string;
			readonly output: string;
			readonly failure: string | null;
			readonly modified: boolean;
	  };

/**
 * Resolved locations of the external tools plus the include tables in effect
 * for this run. Loaded once, never mutated.
 */
export interface ToolConfig {
	readonly cleanerBinary: string;
	readonly gnBinary: string;
	readonly compdbScript: string;
	readonly defaultWorkDir: string;
	readonly includeMappings: ReadonlyArray<IncludeMapping>;
	readonly ignoredHeaders: ReadonlyArray<string>;
	readonly extraArgs: ReadonlyArray<string>;
}

/**
 * Flags the exit code is derived from.
 *
 * @invariant state is immutable
 */
export interface DecisionState {
	readonly checkForChanges: boolean;
	readonly changesGenerated: boolean;
}
