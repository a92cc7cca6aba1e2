// packages/core/src/utils/constants.ts — Shared defaults

/** Upstream fork carrying the accelerator integration branch */
export const DEFAULT_SOURCE_URL = 'https://github.com/ROCm/llama.cpp.git';

/** Integration branch synced by default */
export const DEFAULT_SOURCE_REF = 'amd-integration';

/** Local checkout directory, relative to the project dir */
export const DEFAULT_SOURCE_PATH = 'llama.cpp';

/** Shallow fetch depth */
export const DEFAULT_FETCH_DEPTH = 1;

/** Parallel fetch jobs passed to git */
export const DEFAULT_FETCH_JOBS = 10;

/** Tag placed on the synced upstream commit */
export const DEFAULT_DIFFBASE_TAG = 'UPSTREAM_DIFFBASE';

/** Conventional SDK install location */
export const DEFAULT_SDK_ROOT = '/opt/rocm';

/** Target used when the SDK cannot enumerate any agent */
export const DEFAULT_FALLBACK_TARGET = 'gfx1100';

/** Build output subdirectory of the source tree */
export const DEFAULT_BUILD_SUBDIR = 'build';

export const DEFAULT_BUILD_TYPE = 'Release';

/** Test executables share this file name prefix */
export const TEST_BINARY_PREFIX = 'test-';

/** Overrides the build-output dir used by test discovery */
export const BUILD_DIR_ENV = 'LLAMACPP_BUILD_DIR';

/** Default test mode: `full` or `smoke` */
export const TEST_TYPE_ENV = 'TEST_TYPE';

/** SDK root override below the CLI flag and config file */
export const SDK_ROOT_ENV = 'ROCM_PATH';

export const CONFIG_FILENAME = '.accelbuild.yml';

/** Combined output kept in memory per command (tail) */
export const MAX_CAPTURE_CHARS = 4 * 1024 * 1024;

/** Wait between SIGTERM and SIGKILL for a timed-out command */
export const KILL_GRACE_MS = 5000;

/** Lines of build output carried by BuildFailedError */
export const BUILD_TAIL_LINES = 60;

/** Lines of test output kept per failure in the run summary */
export const FAILURE_TAIL_LINES = 40;

/** Timeout for short probing commands (hipconfig, enumerator, git rev-parse) */
export const PROBE_TIMEOUT_MS = 15_000;

/** Minimum supported Node.js major */
export const MIN_NODE_MAJOR = 20;
