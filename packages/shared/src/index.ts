// Types
export {
  UNKNOWN_BOOT_ID,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_OUTPUT_FILE,
  STATE_DIR_NAME,
  CHECKPOINT_FILE_NAME,
  DEFAULT_EXEC_TIMEOUT_MS,
  MAX_POLL_INTERVAL_MS,
  PROCESS_THREAD_THRESHOLD,
} from './types/common.js';
export type {
  HostIdentity,
  ResourceSummary,
  BootIdSource,
  LogSource,
  SnapshotProvider,
  InventorySource,
} from './types/collaborators.js';

// Schemas: Checkpoint
export { Checkpoint, EMPTY_CHECKPOINT } from './schemas/checkpoint.js';

// Schemas: Logs
export { LogEntry, LogBatch } from './schemas/logs.js';

// Schemas: Snapshot
export { SystemMetrics, Snapshot } from './schemas/snapshot.js';

// Schemas: Inventory
export { HostMetrics, ProcessInfo, ThreadInfo, TrendPoint } from './schemas/inventory.js';
