// PURITY: CORE
// INVARIANT: Every table is frozen; it is read-only for the lifetime of the process
// COMPLEXITY: O(1)

import type { IncludeMapping } from "./models.js";

/** Spelling the cleaner proposes for gtest; the tree wraps it. */
export const GTEST_DEPRECATED = '"gtest/gtest.h"';

/** Project wrapper for gtest. */
export const GTEST_CANONICAL = '"test/gtest.h"';

/**
 * Include spellings the cleaner does not know the project remaps.
 *
 * Applied in order. Keys are literal prefixes of the text after `#include `,
 * so directory entries such as `"libyuv/` rewrite every header below them.
 * The cleaner does not report the full third_party/ path for those.
 */
export const INCLUDE_MAPPINGS: ReadonlyArray<IncludeMapping> = Object.freeze([
	{ from: '"gmock/gmock.h"', to: '"test/gmock.h"' },
	{ from: GTEST_DEPRECATED, to: GTEST_CANONICAL },
	{ from: "<sys/socket.h>", to: '"rtc_base/net_helpers.h"' },
	{ from: '"libyuv/', to: '"third_party/libyuv/include/libyuv/' },
	{ from: '"aom/', to: '"third_party/libaom/source/libaom/aom/' },
	{ from: '"vpx/', to: '"third_party/libvpx/source/libvpx/vpx/' },
]);

/**
 * Header name patterns passed to `--ignore-headers=`.
 */
export const IGNORED_HEADERS: ReadonlyArray<string> = Object.freeze([
	".pb.h", // generated protobuf
	"pipewire/.*.h",
	"spa/.*.h", // pipewire
	"openssl/.*.h", // openssl/boringssl
	"alsa/.*.h",
	"pulse/.*.h", // PulseAudio
]);

/** Search paths appended to every compile command via `--extra-arg=`. */
export const EXTRA_ARGS: ReadonlyArray<string> = Object.freeze([
	"-I../../third_party/googletest/src/googlemock/include/",
	"-I../../third_party/googletest/src/googletest/include/",
]);

/** Suffixes the cleaner is run on; everything else is skipped silently. */
export const SUPPORTED_SUFFIXES: ReadonlyArray<string> = Object.freeze([
	".cc",
	".h",
]);

export const COMPILE_COMMANDS_FILE = "compile_commands.json";

export const DEFAULT_CLEANER_BINARY =
	"third_party/llvm-build/Release+Asserts/bin/clang-include-cleaner";
export const DEFAULT_GN_BINARY = "gn";
export const DEFAULT_COMPDB_SCRIPT = "tools/clang/scripts/generate_compdb.py";
export const DEFAULT_WORK_DIR = "out/Default";

/** Name of the optional per-checkout configuration file. */
export const CONFIG_FILE_NAME = "include-cleaner.config.json";
