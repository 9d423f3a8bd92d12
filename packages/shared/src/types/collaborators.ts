import type { HostMetrics, ProcessInfo } from '../schemas/inventory.js';
import type { LogBatch } from '../schemas/logs.js';

export interface HostIdentity {
  hostname: string;
  /** Primary address, empty when none could be determined */
  ipAddress: string;
}

/** Free-text utilization summaries, passed through to the snapshot untouched */
export interface ResourceSummary {
  cpuInfo: string;
  memoryInfo: string;
  swapInfo: string;
}

export interface BootIdSource {
  readBootId(): Promise<string>;
}

/** Returns the entire retained kernel ring buffer on every call, never a delta */
export interface LogSource {
  readLogs(): Promise<LogBatch>;
}

export interface SnapshotProvider {
  collectIdentity(): Promise<HostIdentity>;
  collectResources(): Promise<ResourceSummary>;
}

/** Standalone host inventory, printed by the `metrics` and `process` commands */
export interface InventorySource {
  collectMetrics(): Promise<HostMetrics>;
  /** Processes running at least `minThreads` threads */
  listProcesses(minThreads?: number): Promise<ProcessInfo[]>;
  /** The process with the most threads, undefined when none could be listed */
  findBusiestProcess(): Promise<ProcessInfo | undefined>;
}
