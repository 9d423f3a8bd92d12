import { setTimeout as delay } from 'node:timers/promises';
import { HostMetrics } from '@ringwatch/shared';
import type { ExecFn, ReadFileFn } from '../types.js';
import { PROC_STAT_PATH, cpuUsagePercent, parseProcStat } from './cpu-usage.js';
import { collectDiskIo } from './disk-io.js';
import { collectDiskUsage } from './disk-usage.js';
import { collectMemoryUsage } from './memory-usage.js';
import { NET_DEV_PATH, networkRates, parseNetDev } from './network-io.js';

/** CPU and network figures are deltas across this window */
export const SAMPLE_WINDOW_MS = 200;

export interface MetricsOptions {
  exec: ExecFn;
  readFile: ReadFileFn;
  serverId: string;
  now?: () => number;
  wait?: (ms: number) => Promise<void>;
  sampleWindowMs?: number;
}

/**
 * Samples /proc/stat and /proc/net/dev twice, one window apart, and gathers the
 * remaining figures while the second sample is taken.
 */
export async function collectHostMetrics(options: MetricsOptions): Promise<HostMetrics> {
  const { exec, readFile, serverId } = options;
  const now = options.now ?? Date.now;
  const wait = options.wait ?? ((ms: number) => delay(ms));
  const windowMs = options.sampleWindowMs ?? SAMPLE_WINDOW_MS;

  const timestamp = now();
  const sampleCpu = async () => parseProcStat(await readFile(PROC_STAT_PATH));
  const sampleNetwork = async () => parseNetDev(await readFile(NET_DEV_PATH));

  const [cpuBefore, netBefore] = await Promise.all([sampleCpu(), sampleNetwork()]);
  await wait(windowMs);
  const [cpuAfter, netAfter, memoryUsage, diskUsage, io] = await Promise.all([
    sampleCpu(),
    sampleNetwork(),
    collectMemoryUsage(exec),
    collectDiskUsage(exec),
    collectDiskIo(readFile),
  ]);
  const network = networkRates(netBefore, netAfter, windowMs);

  return HostMetrics.parse({
    serverId,
    timestamp,
    cpuUsage: cpuUsagePercent(cpuBefore, cpuAfter),
    memoryUsage,
    diskUsage,
    ioRead: io.readMb,
    ioWrite: io.writeMb,
    networkIn: network.inKbPerSec,
    networkOut: network.outKbPerSec,
  });
}
