// PURITY: SHELL (filesystem)
// EFFECT: Effect<string | void, FSError>
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";

/**
 * True iff `p` exists and is a regular file (symlinks followed).
 */
export function isFile(p: string): boolean {
	try {
		return fs.statSync(p).isFile();
	} catch {
		return false;
	}
}

/**
 * True iff `p` exists and is a directory (symlinks followed).
 */
export function isDirectory(p: string): boolean {
	try {
		return fs.statSync(p).isDirectory();
	} catch {
		return false;
	}
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Read a text file. `latin1` maps every byte to one code unit, so text read
 * that way is written back byte for byte whatever the file's real encoding.
 *
 * @effect Effect<string, FSError>
 */
export function readText(
	p: string,
	encoding: BufferEncoding = "utf8",
): Effect.Effect<string, FSError> {
	return Effect.try({
		try: () => fs.readFileSync(p, encoding),
		catch: (error) => new FSError({ path: p, detail: describe(error) }),
	});
}

/**
 * Replace a file's content with text in the given encoding.
 *
 * @effect Effect<void, FSError>
 */
export function writeText(
	p: string,
	content: string,
	encoding: BufferEncoding = "utf8",
): Effect.Effect<void, FSError> {
	return Effect.try({
		try: () => {
			fs.writeFileSync(p, content, encoding);
		},
		catch: (error) => new FSError({ path: p, detail: describe(error) }),
	});
}
