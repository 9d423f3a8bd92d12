import { z } from 'zod';

/**
 * One point-in-time utilization record for `ringwatch metrics`.
 * Percentages and rates carry one decimal place; `timestamp` is epoch milliseconds.
 */
export const HostMetrics = z.object({
  /** `<hostname>-<first 8 chars of machine id>` */
  serverId: z.string(),
  timestamp: z.number().int().nonnegative(),
  cpuUsage: z.number().min(0).max(100),
  memoryUsage: z.number().min(0).max(100),
  diskUsage: z.number().min(0).max(100),
  /** Cumulative MB read from whole disks since boot */
  ioRead: z.number().nonnegative(),
  /** Cumulative MB written to whole disks since boot */
  ioWrite: z.number().nonnegative(),
  /** KB/s received over the sample window, all interfaces */
  networkIn: z.number().nonnegative(),
  /** KB/s sent over the sample window, all interfaces */
  networkOut: z.number().nonnegative(),
});
export type HostMetrics = z.infer<typeof HostMetrics>;

export const ThreadInfo = z.object({
  threadId: z.number().int(),
  userName: z.string(),
  priority: z.number().int(),
  niceValue: z.number().int(),
  virtualMemory: z.string(),
  residentMemory: z.string(),
  sharedMemory: z.string(),
  status: z.string(),
  cpuUsage: z.string(),
  memoryUsage: z.string(),
  /** `H:MM:SS` since the thread started */
  runtime: z.string(),
  command: z.string(),
});
export type ThreadInfo = z.infer<typeof ThreadInfo>;

export const TrendPoint = z.object({
  timestamp: z.number().int().nonnegative(),
  cpuUsage: z.number().nonnegative(),
  memoryUsage: z.number().nonnegative(),
  threadCount: z.number().int().nonnegative(),
});
export type TrendPoint = z.infer<typeof TrendPoint>;

export const ProcessInfo = z.object({
  serverId: z.string(),
  pid: z.number().int().positive(),
  name: z.string(),
  userName: z.string(),
  status: z.string(),
  timestamp: z.number().int().nonnegative(),
  trend: z.array(TrendPoint),
  /** At most the first ten threads of the process */
  threads: z.array(ThreadInfo),
});
export type ProcessInfo = z.infer<typeof ProcessInfo>;
