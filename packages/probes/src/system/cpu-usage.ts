import { percentOf } from '../format.js';

export const PROC_STAT_PATH = '/proc/stat';

export interface CpuTimes {
  /** idle + iowait jiffies */
  idle: number;
  total: number;
}

/**
 * Aggregate `cpu` line of /proc/stat: user nice system idle iowait irq softirq steal.
 * Guest time is already folded into user and nice, so later columns are ignored.
 */
export function parseProcStat(raw: string): CpuTimes {
  const line = raw.split('\n').find((l) => l.startsWith('cpu '));
  if (!line) {
    throw new Error(`No aggregate cpu line in ${PROC_STAT_PATH}`);
  }

  const fields = line
    .trim()
    .split(/\s+/)
    .slice(1, 9)
    .map((field) => Number.parseInt(field, 10) || 0);
  const [user = 0, nice = 0, system = 0, idle = 0, iowait = 0, irq = 0, softirq = 0, steal = 0] =
    fields;

  return {
    idle: idle + iowait,
    total: user + nice + system + idle + iowait + irq + softirq + steal,
  };
}

/** Busy share of the time between two samples, averaged over all cores */
export function cpuUsagePercent(before: CpuTimes, after: CpuTimes): number {
  const total = after.total - before.total;
  const idle = after.idle - before.idle;
  return percentOf(total - idle, total);
}
