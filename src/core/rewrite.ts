// PURITY: CORE
// FORMAT THEOREM: ∀c: rewriteIncludes(rewriteIncludes(c)) = rewriteIncludes(c) for the built-in table
// INVARIANT: Only `#include` lines anchored at line start are touched; the rest of a matched line is kept
// COMPLEXITY: O(n·m) where n = |content|, m = |mappings|

import type { IncludeMapping } from "./models.js";
import { GTEST_CANONICAL, GTEST_DEPRECATED, INCLUDE_MAPPINGS } from "./tables.js";

/**
 * Escape a literal for use inside a RegExp source.
 *
 * @pure true
 */
export function escapeRegExp(literal: string): string {
	return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const DEPRECATED_INCLUDE_LINE = new RegExp(
	`^#include ${escapeRegExp(GTEST_DEPRECATED)}\n`,
	"gm",
);

/**
 * Apply the include remapping table to a file's full text.
 *
 * 1. When the canonical gtest wrapper is already included, every
 *    `#include "gtest/gtest.h"` line is deleted (newline included).
 * 2. Each mapping, in table order, replaces a line-start `#include <from>`
 *    with `#include <to>`; characters after the matched prefix stay.
 *
 * When two keys match the same line, table order decides: each later key
 * only sees the text the earlier entries produced.
 *
 * @pure true
 * @complexity O(n·m)
 *
 * @example
 * ```ts
 * rewriteIncludes('#include "gmock/gmock.h"\n');
 * // => '#include "test/gmock.h"\n'
 * ```
 */
export function rewriteIncludes(
	content: string,
	mappings: ReadonlyArray<IncludeMapping> = INCLUDE_MAPPINGS,
): string {
	let rewritten = content.includes(GTEST_CANONICAL)
		? content.replace(DEPRECATED_INCLUDE_LINE, "")
		: content;

	for (const { from, to } of mappings) {
		const pattern = new RegExp(`^#include ${escapeRegExp(from)}`, "gm");
		// Function replacer: `to` comes from configuration and may contain `$`.
		rewritten = rewritten.replace(pattern, () => `#include ${to}`);
	}
	return rewritten;
}

/**
 * Drop known false positives from the cleaner's change report.
 *
 * With TEST_P and friends the cleaner asks to add `"gtest/gtest.h"` even when
 * the file already includes the project wrapper; those `+ "gtest/gtest.h"`
 * lines are removed. Other lines keep their order.
 *
 * @param output - Trimmed stdout of `--print=changes`
 * @param content - Current text of the analysed file
 * @returns Adjusted report; empty when nothing remains
 *
 * @pure true
 * @complexity O(n) where n = |output|
 */
export function adjustCleanerOutput(output: string, content: string): string {
	if (!content.includes(GTEST_CANONICAL)) {
		return output;
	}
	const falsePositive = `+ ${GTEST_DEPRECATED}`;
	return output
		.split("\n")
		.filter((line) => line !== falsePositive)
		.join("\n")
		.trim();
}
