/** Substituted when the host does not expose a boot identifier */
export const UNKNOWN_BOOT_ID = 'unknown';

/** Default polling interval in milliseconds */
export const DEFAULT_POLL_INTERVAL_MS = 5_000;

/** Default snapshot file, relative to the working directory */
export const DEFAULT_OUTPUT_FILE = 'continuous_monitor.json';

/** Default state directory name, under the user's home */
export const STATE_DIR_NAME = '.ringwatch';

/** Checkpoint file name inside the state directory */
export const CHECKPOINT_FILE_NAME = 'checkpoint.json';

/** Timeout for a single host command in milliseconds */
export const DEFAULT_EXEC_TIMEOUT_MS = 10_000;

/** Longest delay a Node timer can hold (2^31 - 1 ms); longer ones fire after 1 ms */
export const MAX_POLL_INTERVAL_MS = 2_147_483_647;

/** `process` lists only processes running at least this many threads */
export const PROCESS_THREAD_THRESHOLD = 20;
