// PURITY: SHELL (console output)
// INVARIANT: debug lines are emitted only when enabled; info → stdout, error → stderr

/**
 * Output sink used by every SHELL/APP module instead of reaching for
 * `console` directly, so tests can capture the exact lines printed.
 */
export interface Logger {
	readonly info: (message: string) => void;
	readonly error: (message: string) => void;
	readonly debug: (message: string) => void;
}

const DEBUG_PREFIX = "[include-cleaner]";

/**
 * True when `INCLUDE_CLEANER_DEBUG=1` is set.
 *
 * @pure true
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv): boolean {
	return env["INCLUDE_CLEANER_DEBUG"] === "1";
}

/**
 * Logger backed by the process console.
 *
 * @param debugEnabled - Emit `debug` lines (to stderr, prefixed)
 */
export function createConsoleLogger(debugEnabled: boolean): Logger {
	return {
		info: (message) => {
			console.log(message);
		},
		error: (message) => {
			console.error(message);
		},
		debug: (message) => {
			if (debugEnabled) {
				console.error(DEBUG_PREFIX, message);
			}
		},
	};
}
