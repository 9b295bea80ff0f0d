import { afterEach, describe, expect, it } from "vitest";

import {
	checkAndReportPreflight,
	runPreflight,
} from "../../../src/shell/analysis/preflight.js";
import { createMemoryLogger } from "../../utils/fakes.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

describe("preflight", () => {
	let project: TempProject | undefined;

	afterEach((): void => {
		project?.cleanup();
		project = undefined;
	});

	it("finds nothing when the cleaner exists", (): void => {
		project = createTempProject({ "bin/clang-include-cleaner": "" });
		const logger = createMemoryLogger();
		expect(
			checkAndReportPreflight(project.resolve("bin/clang-include-cleaner"), logger),
		).toBe(true);
		expect(logger.infoLines).toEqual([]);
	});

	it("explains how to fetch a missing cleaner", (): void => {
		project = createTempProject();
		const missing = project.resolve("bin/clang-include-cleaner");
		const logger = createMemoryLogger();
		expect(runPreflight(missing)).toEqual(["missingCleaner"]);
		expect(checkAndReportPreflight(missing, logger)).toBe(false);
		expect(logger.infoLines).toEqual([
			`clang-include-cleaner not found in ${missing}`,
			"Add '\"checkout_clangd\": True' to 'custom_vars' in your .gclient file and run 'gclient sync'.",
		]);
	});
});
