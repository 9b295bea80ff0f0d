// PURITY: CORE
// INVARIANT: Builders return fresh argv arrays; argv[0] is the executable
// COMPLEXITY: O(k) where k = |ignoredHeaders| + |extraArgs|

import { match } from "ts-pattern";

import type { CleanerMode } from "./models.js";

/**
 * Inputs of the cleaner command that stay fixed for the whole run.
 */
export interface CleanerCommandOptions {
	readonly cleanerBinary: string;
	readonly workDir: string;
	readonly ignoredHeaders: ReadonlyArray<string>;
	readonly extraArgs: ReadonlyArray<string>;
	readonly mode: CleanerMode;
}

/**
 * Base argv of clang-include-cleaner, without the file operand.
 *
 * @pure true
 *
 * @example
 * ```ts
 * buildCleanerCommand({
 *   cleanerBinary: "cleaner", workDir: "out", ignoredHeaders: [".pb.h"],
 *   extraArgs: ["-Ifoo"], mode: "print",
 * });
 * // => ["cleaner", "-p", "out", "--ignore-headers=.pb.h", "--extra-arg=-Ifoo", "--print=changes"]
 * ```
 */
export function buildCleanerCommand(
	options: CleanerCommandOptions,
): ReadonlyArray<string> {
	const modeFlag = match(options.mode)
		.with("edit", () => "--edit")
		.with("print", () => "--print=changes")
		.exhaustive();
	return [
		options.cleanerBinary,
		"-p",
		options.workDir,
		`--ignore-headers=${options.ignoredHeaders.join(",")}`,
		...options.extraArgs.map((arg) => `--extra-arg=${arg}`),
		modeFlag,
	];
}

/**
 * `gn refs -C <workDir> <file>`: exits 0 iff some target references the file.
 *
 * @pure true
 */
export function buildGnRefsCommand(
	gnBinary: string,
	workDir: string,
	file: string,
): ReadonlyArray<string> {
	return [gnBinary, "refs", "-C", workDir, file];
}

/**
 * Compile database generator; prints the JSON on stdout.
 *
 * @pure true
 */
export function buildCompdbCommand(
	script: string,
	workDir: string,
): ReadonlyArray<string> {
	return [script, "-p", workDir];
}

/**
 * Render argv for logs. Arguments with whitespace are double-quoted.
 *
 * @pure true
 */
export function formatCommand(argv: ReadonlyArray<string>): string {
	return argv.map((arg) => (/\s/.test(arg) ? `"${arg}"` : arg)).join(" ");
}
