import os from 'node:os';
import type {
  BootIdSource,
  InventorySource,
  LogSource,
  SnapshotProvider,
} from '@ringwatch/shared';
import { defaultExec, defaultReadFile } from './exec.js';
import { readBootId } from './system/boot-id.js';
import { collectHostIdentity } from './system/host-identity.js';
import { readKernelLog } from './system/logs-dmesg.js';
import { collectHostMetrics } from './system/metrics.js';
import { findBusiestProcess, listProcesses } from './system/processes.js';
import { buildServerId, readMachineId } from './system/server-id.js';
import { collectTopSummary } from './system/top-summary.js';
import type { ExecFn, ReadFileFn } from './types.js';

export type { ExecFn, ReadFileFn } from './types.js';
export { defaultExec, defaultReadFile } from './exec.js';
export { BOOT_ID_PATH, normalizeBootId, readBootId } from './system/boot-id.js';
export {
  collectHostIdentity,
  parseHostnameIOutput,
  parseIpRouteOutput,
} from './system/host-identity.js';
export { collectTopSummary, parseTopOutput } from './system/top-summary.js';
export {
  parseDmesgOutput,
  parseLogLine,
  parseLogTimestamp,
  readKernelLog,
} from './system/logs-dmesg.js';
export { formatMemory, percentOf, roundTenths } from './format.js';
export { cpuUsagePercent, parseProcStat } from './system/cpu-usage.js';
export { memoryUsagePercent, parseFreeOutput } from './system/memory-usage.js';
export { diskUsagePercent, parseDfOutput } from './system/disk-usage.js';
export { isWholeDisk, parseDiskStats } from './system/disk-io.js';
export { networkRates, parseNetDev } from './system/network-io.js';
export { SAMPLE_WINDOW_MS, collectHostMetrics } from './system/metrics.js';
export {
  describeState,
  findBusiestProcess,
  formatElapsed,
  listProcesses,
  parsePsOutput,
  parseThreadOutput,
} from './system/processes.js';
export { MACHINE_ID_PATHS, buildServerId, readMachineId } from './system/server-id.js';

export interface HostCollaborators
  extends BootIdSource,
    LogSource,
    SnapshotProvider,
    InventorySource {}

export interface HostCollaboratorOptions {
  exec?: ExecFn;
  readFile?: ReadFileFn;
  hostname?: () => string;
  /** Epoch milliseconds stamped on inventory records */
  now?: () => number;
  /** Pause between the two metric samples */
  wait?: (ms: number) => Promise<void>;
}

/** Bundle the host probes behind the interfaces the monitor and CLI consume */
export function createHostCollaborators(options: HostCollaboratorOptions = {}): HostCollaborators {
  const exec = options.exec ?? defaultExec;
  const readFile = options.readFile ?? defaultReadFile;
  const hostname = options.hostname ?? os.hostname;
  const now = options.now ?? Date.now;
  const serverId = async () => buildServerId(hostname(), await readMachineId(readFile));

  return {
    readBootId: () => readBootId(readFile),
    readLogs: () => readKernelLog(exec),
    collectIdentity: () => collectHostIdentity(exec, hostname),
    collectResources: () => collectTopSummary(exec),
    collectMetrics: async () =>
      collectHostMetrics({ exec, readFile, serverId: await serverId(), now, wait: options.wait }),
    listProcesses: async (minThreads) =>
      listProcesses(exec, { serverId: await serverId(), timestamp: now() }, minThreads),
    findBusiestProcess: async () =>
      findBusiestProcess(exec, { serverId: await serverId(), timestamp: now() }),
  };
}
