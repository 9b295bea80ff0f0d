// PURITY: SHELL (validateCLIOptions reads the filesystem; parseCLIArgs is pure)
// INVARIANT: A parsed run has files.length > 0; validated options name existing files and an existing work dir
// COMPLEXITY: O(n) where n = |args|

import { Effect, Either } from "effect";

import { UsageError } from "../../core/errors.js";
import { DEFAULT_WORK_DIR } from "../../core/tables.js";
import { isDirectory, isFile } from "../utils/fs.js";

export const PROGRAM_NAME = "apply-include-cleaner";

/**
 * Options of one run, as given on the command line.
 */
export interface CLIOptions {
	readonly files: ReadonlyArray<string>;
	readonly print: boolean;
	readonly checkForChanges: boolean;
	readonly workDir: string;
}

/**
 * What the command line asks for: the help text, or a run.
 */
export type ParsedCommandLine =
	| { readonly kind: "help" }
	| { readonly kind: "run"; readonly options: CLIOptions };

interface ArgState extends CLIOptions {
	readonly help: boolean;
}

type FlagHandler = (state: ArgState) => ArgState;

// Boolean flags come in pairs, `--x` / `--no-x`; the last one given wins.
const booleanFlags: ReadonlyMap<string, FlagHandler> = new Map<
	string,
	FlagHandler
>([
	["-p", (s) => ({ ...s, print: true })],
	["--print", (s) => ({ ...s, print: true })],
	["--no-print", (s) => ({ ...s, print: false })],
	["-c", (s) => ({ ...s, checkForChanges: true })],
	["--check-for-changes", (s) => ({ ...s, checkForChanges: true })],
	["--no-check-for-changes", (s) => ({ ...s, checkForChanges: false })],
	["-h", (s) => ({ ...s, help: true })],
	["--help", (s) => ({ ...s, help: true })],
]);

const WORK_DIR_FLAGS: ReadonlySet<string> = new Set(["-w", "--work-dir"]);
const WORK_DIR_INLINE = "--work-dir=";

function isOption(arg: string): boolean {
	return arg.startsWith("-") && arg !== "-";
}

const missingWorkDir = (): UsageError =>
	new UsageError({ message: "argument -w/--work-dir: expected one argument" });

/**
 * Short options written together: `-pc`, `-wout/Debug`, `-cw out/Debug`.
 * Everything after `w` is its value; with nothing after it, the next argument is.
 *
 * @returns Updated state and whether `next` was consumed
 */
function applyShortCluster(
	state: ArgState,
	arg: string,
	next: string | undefined,
): Either.Either<{ readonly state: ArgState; readonly consumedNext: boolean }, UsageError> {
	let current = state;
	for (let j = 1; j < arg.length; j++) {
		const flag = arg.charAt(j);
		if (flag === "w") {
			const attached = arg.slice(j + 1);
			if (attached.length > 0) {
				return Either.right({
					state: { ...current, workDir: attached },
					consumedNext: false,
				});
			}
			if (next === undefined) {
				return Either.left(missingWorkDir());
			}
			return Either.right({
				state: { ...current, workDir: next },
				consumedNext: true,
			});
		}
		const handler = booleanFlags.get(`-${flag}`);
		if (handler === undefined) {
			return Either.left(
				new UsageError({ message: `unrecognized arguments: ${arg}` }),
			);
		}
		current = handler(current);
	}
	return Either.right({ state: current, consumedNext: false });
}

/**
 * Parse command line arguments (without node and script path).
 *
 * @param args - `process.argv.slice(2)`
 * @param defaultWorkDir - Work dir used when `-w` is absent
 * @returns Either the parsed command line or a UsageError
 *
 * @pure true
 *
 * @example
 * ```ts
 * parseCLIArgs(["-c", "-w", "out/Debug", "pc/foo.cc"]);
 * // Right({ kind: "run", options: { files: ["pc/foo.cc"], print: false,
 * //   checkForChanges: true, workDir: "out/Debug" } })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string>,
	defaultWorkDir: string = DEFAULT_WORK_DIR,
): Either.Either<ParsedCommandLine, UsageError> {
	let state: ArgState = {
		files: [],
		print: false,
		checkForChanges: false,
		workDir: defaultWorkDir,
		help: false,
	};
	let optionsEnded = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (optionsEnded || !isOption(arg)) {
			state = { ...state, files: [...state.files, arg] };
			continue;
		}
		if (arg === "--") {
			optionsEnded = true;
			continue;
		}
		const handler = booleanFlags.get(arg);
		if (handler !== undefined) {
			state = handler(state);
			continue;
		}
		if (arg.startsWith(WORK_DIR_INLINE)) {
			state = { ...state, workDir: arg.slice(WORK_DIR_INLINE.length) };
			continue;
		}
		if (WORK_DIR_FLAGS.has(arg)) {
			const value = args[i + 1];
			if (value === undefined) {
				return Either.left(missingWorkDir());
			}
			state = { ...state, workDir: value };
			i++;
			continue;
		}
		if (arg.startsWith("--")) {
			return Either.left(
				new UsageError({ message: `unrecognized arguments: ${arg}` }),
			);
		}
		const cluster = applyShortCluster(state, arg, args[i + 1]);
		if (Either.isLeft(cluster)) {
			return Either.left(cluster.left);
		}
		state = cluster.right.state;
		if (cluster.right.consumedNext) {
			i++;
		}
	}

	if (state.help) {
		const help: ParsedCommandLine = { kind: "help" };
		return Either.right(help);
	}
	if (state.files.length === 0) {
		return Either.left(
			new UsageError({
				message: "the following arguments are required: files",
			}),
		);
	}
	const run: ParsedCommandLine = {
		kind: "run",
		options: {
			files: state.files,
			print: state.print,
			checkForChanges: state.checkForChanges,
			workDir: state.workDir,
		},
	};
	return Either.right(run);
}

/**
 * Reject files and work dirs that do not exist, before anything runs.
 *
 * @pure false (stat calls)
 * @effect Effect<CLIOptions, UsageError>
 */
export function validateCLIOptions(
	options: CLIOptions,
): Effect.Effect<CLIOptions, UsageError> {
	return Effect.suspend((): Effect.Effect<CLIOptions, UsageError> => {
		const missingFile = options.files.find((file) => !isFile(file));
		if (missingFile !== undefined) {
			return Effect.fail(
				new UsageError({
					message: `argument files: File path ${missingFile} does not exist!`,
				}),
			);
		}
		if (!isDirectory(options.workDir)) {
			return Effect.fail(
				new UsageError({
					message: `argument -w/--work-dir: Dir path ${options.workDir} does not exist!`,
				}),
			);
		}
		return Effect.succeed(options);
	});
}

/**
 * One-line synopsis, printed above usage errors.
 *
 * @pure true
 */
export function formatUsageLine(): string {
	return `usage: ${PROGRAM_NAME} [-h] [-p | --no-print] [-c | --no-check-for-changes] [-w WORK_DIR] files [files ...]`;
}

/**
 * Full `--help` text.
 *
 * @pure true
 */
export function formatHelp(defaultWorkDir: string): string {
	return [
		formatUsageLine(),
		"",
		"Runs the include-cleaner tool on a list of files",
		"",
		"positional arguments:",
		"  files                 List of files to process",
		"",
		"options:",
		"  -h, --help            show this help message and exit",
		"  -p, --print, --no-print",
		"                        Don't modify the files, just print the changes (default: False)",
		"  -c, --check-for-changes, --no-check-for-changes",
		"                        Checks whether include-cleaner generated changes and exit with",
		"                        1 in case it did. Used for bot validation that the current commit",
		"                        did not introduce an include regression. (default: False)",
		"  -w WORK_DIR, --work-dir WORK_DIR",
		`                        Specify the gn workdir (default: ${defaultWorkDir})`,
	].join("\n");
}
