import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { ensureCompileCommands } from "../../../src/shell/compdb/generate.js";
import {
	createFakeRunner,
	createMemoryLogger,
	exited,
	ok,
	spawnFailure,
} from "../../utils/fakes.js";
import {
	createTempProject,
	makeDir,
	type TempProject,
} from "../../utils/tempProject.js";

const COMPDB = '[{"directory": ".", "file": "a.cc", "command": "clang++ a.cc"}]';

describe("ensureCompileCommands", () => {
	let project: TempProject | undefined;

	afterEach((): void => {
		project?.cleanup();
		project = undefined;
	});

	it("keeps an existing database without running the generator", async (): Promise<void> => {
		project = createTempProject({ "out/Default/compile_commands.json": "[]" });
		const runner = createFakeRunner(() => ok(COMPDB));
		const logger = createMemoryLogger();
		await Effect.runPromise(
			ensureCompileCommands(runner, logger, "gen.py", project.resolve("out/Default")),
		);
		expect(runner.calls).toEqual([]);
		expect(logger.infoLines).toEqual([]);
		expect(project.read("out/Default/compile_commands.json")).toBe("[]");
	});

	it("looks for an existing database when run, not when built", async (): Promise<void> => {
		project = createTempProject();
		const workDir = makeDir(project, "out/Default");
		const runner = createFakeRunner(() => ok(COMPDB));
		const generate = ensureCompileCommands(
			runner,
			createMemoryLogger(),
			"gen.py",
			workDir,
		);
		project.write("out/Default/compile_commands.json", "[]");
		await Effect.runPromise(generate);
		expect(runner.calls).toEqual([]);
		expect(project.read("out/Default/compile_commands.json")).toBe("[]");
	});

	it("writes the generator's stdout when the database is absent", async (): Promise<void> => {
		project = createTempProject();
		const workDir = makeDir(project, "out/Default");
		const runner = createFakeRunner(() => ok(COMPDB));
		const logger = createMemoryLogger();
		await Effect.runPromise(ensureCompileCommands(runner, logger, "gen.py", workDir));
		expect(runner.calls).toEqual([["gen.py", "-p", workDir]]);
		expect(logger.infoLines).toEqual(["Generating compile commands file..."]);
		expect(project.read("out/Default/compile_commands.json")).toBe(COMPDB);
	});

	it("fails without writing when the generator exits non-zero", async (): Promise<void> => {
		project = createTempProject();
		const workDir = makeDir(project, "out/Default");
		const runner = createFakeRunner(() => exited(1, "gn gen failed\n", "partial"));
		const result = await Effect.runPromise(
			Effect.either(
				ensureCompileCommands(runner, createMemoryLogger(), "gen.py", workDir),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("CompileDbError");
			expect(result.left.workDir).toBe(workDir);
			expect(result.left.detail).toBe("gen.py exited with code 1: gn gen failed");
		}
		expect(() => project?.read("out/Default/compile_commands.json")).toThrow();
	});

	it("fails when the generator cannot be started", async (): Promise<void> => {
		project = createTempProject();
		const workDir = makeDir(project, "out/Default");
		const runner = createFakeRunner(() => spawnFailure("gen.py"));
		const result = await Effect.runPromise(
			Effect.either(
				ensureCompileCommands(runner, createMemoryLogger(), "gen.py", workDir),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.detail).toBe("spawn gen.py ENOENT");
		}
	});
});
