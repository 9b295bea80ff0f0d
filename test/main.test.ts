import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { type MainEnvironment, main } from "../src/main.js";
import { formatHelp, formatUsageLine } from "../src/shell/config/cli.js";
import {
	createFakeRunner,
	createMemoryLogger,
	exited,
	type FakeHandler,
	type MemoryLogger,
	ok,
} from "./utils/fakes.js";
import { createTempProject, type TempProject } from "./utils/tempProject.js";

describe("main", () => {
	let project: TempProject;
	let logger: MemoryLogger;

	beforeEach((): void => {
		project = createTempProject({
			"bin/clang-include-cleaner": "",
			"out/Default/compile_commands.json": "[]",
			"pc/foo.cc": '#include "pc/foo.h"\n',
		});
		logger = createMemoryLogger();
	});

	afterEach((): void => {
		project.cleanup();
	});

	const environment = (handler: FakeHandler = () => ok()): MainEnvironment => ({
		cwd: project.cwd,
		env: { INCLUDE_CLEANER_BINARY: project.resolve("bin/clang-include-cleaner") },
		logger,
		runner: createFakeRunner(handler),
	});

	const run = (args: ReadonlyArray<string>, env = environment()): Promise<number> =>
		Effect.runPromise(main(args, env));

	it("exits 2 with the usage line when no file is given", async (): Promise<void> => {
		await expect(run([])).resolves.toBe(2);
		expect(logger.errorLines).toEqual([
			formatUsageLine(),
			"apply-include-cleaner: error: the following arguments are required: files",
		]);
	});

	it("prints preflight guidance before rejecting the command line", async (): Promise<void> => {
		const missing = project.resolve("missing/clang-include-cleaner");
		const code = await run([], {
			...environment(),
			env: { INCLUDE_CLEANER_BINARY: missing },
		});
		expect(code).toBe(2);
		expect(logger.infoLines).toEqual([
			`clang-include-cleaner not found in ${missing}`,
			"Add '\"checkout_clangd\": True' to 'custom_vars' in your .gclient file and run 'gclient sync'.",
		]);
		expect(logger.errorLines[0]).toBe(formatUsageLine());
	});

	it("exits 2 for a file that does not exist", async (): Promise<void> => {
		const missing = project.resolve("pc/missing.cc");
		await expect(
			run(["-w", project.resolve("out/Default"), missing]),
		).resolves.toBe(2);
		expect(logger.errorLines[1]).toBe(
			`apply-include-cleaner: error: argument files: File path ${missing} does not exist!`,
		);
	});

	it("prints help with the configured default work dir", async (): Promise<void> => {
		project.write(
			"include-cleaner.config.json",
			JSON.stringify({ defaultWorkDir: "out/Release" }),
		);
		await expect(run(["--help"])).resolves.toBe(0);
		expect(logger.infoLines).toEqual([formatHelp("out/Release")]);
	});

	it("exits 1 when the config file is not JSON", async (): Promise<void> => {
		project.write("include-cleaner.config.json", "not json");
		await expect(run(["pc/foo.cc"])).resolves.toBe(1);
		expect(logger.errorLines).toHaveLength(1);
		expect(logger.errorLines[0]?.startsWith(
			`Fatal error: cannot load ${path.join(project.cwd, "include-cleaner.config.json")}: `,
		)).toBe(true);
	});

	it("exits 1 in check mode when a file needs changes", async (): Promise<void> => {
		const code = await run([
			"-c",
			"-w",
			project.resolve("out/Default"),
			project.resolve("pc/foo.cc"),
		], environment((argv) => (argv[0] === "gn" ? ok() : ok('- "pc/foo.h"'))));
		expect(code).toBe(1);
		expect(logger.infoLines[0]).toBe('- "pc/foo.h"');
	});

	it("exits 1 when the compile database cannot be generated", async (): Promise<void> => {
		const workDir = project.resolve("out/Empty");
		project.write("out/Empty/args.gn", "");
		const code = await run(
			["-w", workDir, project.resolve("pc/foo.cc")],
			environment(() => exited(1, "boom")),
		);
		expect(code).toBe(1);
		expect(logger.errorLines).toEqual([
			`Fatal error: could not generate compile commands in ${workDir}: tools/clang/scripts/generate_compdb.py exited with code 1: boom`,
		]);
	});
});
