import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import {
	EXTRA_ARGS,
	IGNORED_HEADERS,
	INCLUDE_MAPPINGS,
} from "../../../src/core/tables.js";
import {
	defaultToolConfig,
	loadToolConfig,
	mergeToolConfig,
} from "../../../src/shell/config/loader.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

describe("defaultToolConfig", () => {
	it("uses the checkout-relative tool locations", (): void => {
		const config = defaultToolConfig({});
		expect(config.cleanerBinary).toBe(
			"third_party/llvm-build/Release+Asserts/bin/clang-include-cleaner",
		);
		expect(config.gnBinary).toBe("gn");
		expect(config.compdbScript).toBe("tools/clang/scripts/generate_compdb.py");
		expect(config.defaultWorkDir).toBe("out/Default");
		expect(config.includeMappings).toBe(INCLUDE_MAPPINGS);
	});

	it("runs gn through depot_tools when DEPOT_TOOLS_PATH is set", (): void => {
		expect(defaultToolConfig({ DEPOT_TOOLS_PATH: "/opt/depot_tools" }).gnBinary).toBe(
			path.join("/opt/depot_tools", "gn.py"),
		);
		expect(defaultToolConfig({ DEPOT_TOOLS_PATH: "" }).gnBinary).toBe("gn");
	});
});

describe("mergeToolConfig", () => {
	const base = defaultToolConfig({});

	it("appends mappings and lists after the built-in tables", (): void => {
		const merged = mergeToolConfig(base, {
			includeMappings: { '"absl/': '"third_party/abseil-cpp/absl/' },
			ignoredHeaders: ["x11/.*.h"],
			extraArgs: ["-DTEST"],
		});
		expect(merged.includeMappings).toEqual([
			...INCLUDE_MAPPINGS,
			{ from: '"absl/', to: '"third_party/abseil-cpp/absl/' },
		]);
		expect(merged.ignoredHeaders).toEqual([...IGNORED_HEADERS, "x11/.*.h"]);
		expect(merged.extraArgs).toEqual([...EXTRA_ARGS, "-DTEST"]);
	});

	it("overrides tool paths with non-empty strings only", (): void => {
		const merged = mergeToolConfig(base, {
			cleanerBinary: "/usr/bin/clang-include-cleaner",
			gnBinary: "",
			defaultWorkDir: "out/Release",
		});
		expect(merged.cleanerBinary).toBe("/usr/bin/clang-include-cleaner");
		expect(merged.gnBinary).toBe("gn");
		expect(merged.defaultWorkDir).toBe("out/Release");
	});

	it("ignores entries of the wrong type", (): void => {
		const merged = mergeToolConfig(base, {
			cleanerBinary: 7,
			ignoredHeaders: ["ok.h", 3, null],
			extraArgs: "-DX",
			includeMappings: { '"a/': 1, '"b/': '"c/' },
		});
		expect(merged.cleanerBinary).toBe(base.cleanerBinary);
		expect(merged.ignoredHeaders).toEqual([...IGNORED_HEADERS, "ok.h"]);
		expect(merged.extraArgs).toEqual(EXTRA_ARGS);
		expect(merged.includeMappings).toEqual([
			...INCLUDE_MAPPINGS,
			{ from: '"b/', to: '"c/' },
		]);
	});

	it("returns the base for a document that is not an object", (): void => {
		expect(mergeToolConfig(base, ["cleanerBinary"])).toBe(base);
		expect(mergeToolConfig(base, null)).toBe(base);
	});
});

describe("loadToolConfig", () => {
	let project: TempProject | undefined;

	afterEach((): void => {
		project?.cleanup();
		project = undefined;
	});

	it("returns the defaults without a config file", async (): Promise<void> => {
		project = createTempProject();
		const config = await Effect.runPromise(loadToolConfig(project.cwd, {}));
		expect(config).toEqual(defaultToolConfig({}));
		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.includeMappings)).toBe(true);
	});

	it("reads include-cleaner.config.json from the working directory", async (): Promise<void> => {
		project = createTempProject({
			"include-cleaner.config.json": JSON.stringify({
				gnBinary: "tools/gn",
				ignoredHeaders: ["gen/.*.h"],
			}),
		});
		const config = await Effect.runPromise(loadToolConfig(project.cwd, {}));
		expect(config.gnBinary).toBe("tools/gn");
		expect(config.ignoredHeaders).toEqual([...IGNORED_HEADERS, "gen/.*.h"]);
	});

	it("lets the environment override the file", async (): Promise<void> => {
		project = createTempProject({
			"include-cleaner.config.json": JSON.stringify({
				cleanerBinary: "from-file",
				gnBinary: "gn-from-file",
			}),
		});
		const config = await Effect.runPromise(
			loadToolConfig(project.cwd, {
				INCLUDE_CLEANER_BINARY: "from-env",
				INCLUDE_CLEANER_GN: "gn-from-env",
			}),
		);
		expect(config.cleanerBinary).toBe("from-env");
		expect(config.gnBinary).toBe("gn-from-env");
	});

	it("fails with ConfigError on malformed JSON", async (): Promise<void> => {
		project = createTempProject({ "include-cleaner.config.json": "{ nope" });
		const result = await Effect.runPromise(
			Effect.either(loadToolConfig(project.cwd, {})),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ConfigError");
			expect(result.left.path).toBe(
				path.join(project.cwd, "include-cleaner.config.json"),
			);
		}
	});
});
